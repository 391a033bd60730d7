export * from "./constants.js";
export * from "./types.js";
export * from "./errors.js";
export { atomicWriteFile } from "./utils/atomic-write.js";
export {
  configDir,
  configPath,
  logsDir,
  credentialsSearchPaths,
} from "./utils/paths.js";
export {
  partCount,
  partRanges,
  splitIntoParts,
  joinParts,
  inspectPartSet,
  assertPartSetComplete,
  type PartSetSummary,
} from "./utils/chunks.js";
export {
  partSubject,
  parsePartSubject,
  encodePartMetadata,
  decodePartMetadata,
} from "./utils/part-subject.js";
export {
  VIRTUAL_SEPARATOR,
  validateSegment,
  encodeFolderPath,
  decodeFolderPath,
  parseVirtualPath,
  formatVirtualPath,
  splitRemotePath,
} from "./utils/folder-path.js";
