export * from "./types.js";
export {
  BuildError,
  ChecksumError,
  CompressionError,
  ConfigurationError,
  FilesystemError,
  ImageWriteError,
  NotificationError,
  SizeLimitExceededError,
  EXIT_CONFIGURATION,
  EXIT_FILESYSTEM,
  EXIT_IMAGE_WRITE,
  EXIT_SIZE_LIMIT,
  EXIT_SUCCESS,
  errorMessage,
  isBuildError,
  toErrorRecord,
  type BuildErrorRecord,
  type ErrorKind,
} from "./errors.js";
export { createFilterSet, isExcludedDirectory, matches, type FilterSetInput } from "./filter.js";
export { collectCandidates, traverse, type TraversalOptions } from "./traversal.js";
export {
  COMPRESSION_METHODS,
  compressPayload,
  computeDigest,
  decompressPayload,
  fileDigest,
  getDefaultConcurrency,
  processEntry,
  type ProcessOptions,
} from "./processor.js";
export { processCandidates, type PoolHooks, type PoolOptions, type PoolResult } from "./runner/pool.js";
export { ManifestBuilder, resolveLabel, type ManifestBuilderOptions } from "./manifest.js";
export {
  MkisofsImageAuthor,
  PlanningImageAuthor,
  resolveIsoTool,
  type AuthorOperation,
  type ImageAuthor,
  type IsoToolOptions,
} from "./author.js";
export {
  archivePathFor,
  assembleImage,
  normalizeVolumeLabel,
  type AssembleRequest,
} from "./assembler.js";
export {
  composeNotification,
  createSmtpNotifier,
  createTransportNotifier,
  dispatchNotification,
  smtpSettingsFromEnv,
  type NotificationMessage,
  type Notifier,
  type SmtpSettings,
} from "./notifier.js";
export {
  loadConfig,
  parseByteSize,
  resolveBuildConfig,
  type BuildConfig,
  type IsobuildConfig,
} from "./config.js";
