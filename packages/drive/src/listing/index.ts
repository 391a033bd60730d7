export { listFolder, listAllFolders, type ListOptions } from "./list.js";
export { downloadFile, downloadToPath, type DownloadResult } from "./download.js";
export { removeFile, type RemoveResult } from "./remove.js";
export { groupParts, summarizeFile, type PartRef, type FolderContents, type SkippedMessage } from "./group.js";
