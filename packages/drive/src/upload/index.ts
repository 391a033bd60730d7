export {
  planUpload,
  uploadPath,
  uploadFile,
  type UploadOptions,
  type UploadProgress,
  type UploadPlan,
  type PlannedFile,
  type UploadResult,
} from "./pipeline.js";
export type { UploadedFile } from "@mailstash/shared";
