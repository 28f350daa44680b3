export * from "./types.js";
export {
  ensureParentDirectory,
  mirrorPath,
  numberedPath,
  OutputNameRegistry,
  resolveCollision,
} from "./paths.js";
export {
  classifyStream,
  FfprobeCodecProbe,
  parseFfprobeOutput,
  STILL_CODECS,
  type CodecProbe,
  type StreamDescriptor,
} from "./probe.js";
export {
  buildMagickArgs,
  convertAndVerify,
  MagickConverter,
  type ConversionRequest,
  type ConversionResult,
  type ImageConverter,
} from "./converter.js";
export { SharpCodecProbe, SharpConverter } from "./sharp-engine.js";
export { DiscoveryError, discoverImages, IMAGE_EXTENSIONS, isImageFile } from "./discovery.js";
export { aggregateOutcomes, ReportAccumulator } from "./report.js";
export {
  DEFAULT_CONCURRENCY,
  DEFAULT_SETTINGS,
  runConversion,
  type SchedulerCollaborators,
  type SchedulerOptions,
} from "./scheduler.js";
export { runProcess, ProcessError, type ProcessRunner } from "./process.js";
