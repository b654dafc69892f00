export type { DocumentSource } from "./document-source";
export { FileDocumentSource } from "./file-source";
export { S3DocumentSource, type S3DocumentSourceOptions } from "./s3-source";
export {
  ParameterStoreDocumentSource,
  type ParameterStoreDocumentSourceOptions,
} from "./parameter-store-source";
