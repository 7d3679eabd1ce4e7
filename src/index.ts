export { runCli, type CliContext } from './cli.js'
export {
  loadSlidescribeConfig,
  parseSlidescribeConfig,
  type SlidescribeConfig,
} from './config.js'
export { createDaemonServer, runDaemonServer, type DaemonContext } from './daemon/server.js'
export { SlideChangeDetector, type SlideBoundary } from './detection/slide-change.js'
export {
  AudioExtractionError,
  ProcessError,
  VideoSourceError,
  WhisperUnavailableError,
} from './errors.js'
export type { FailureRecord, FailureTool } from './failures/recorder.js'
export { compareFrames, histogramSimilarity, structuralSimilarity } from './frames/compare.js'
export { resizeFrameArea, resizeFramePercent, scaledDimensions } from './frames/resize.js'
export type { FrameScores, RgbFrame } from './frames/types.js'
export { JobRegistry, type CancelResult, type JobRunner } from './jobs/registry.js'
export type { JobSnapshot, JobStatus, ProcessingEvent } from './jobs/types.js'
export { createAppLogging, createSilentLogger, type AppLogger } from './logging/logger.js'
export { processVideo, type ProcessorDeps } from './processing/processor.js'
export {
  DEFAULT_PROCESSING_SETTINGS,
  resolveProcessingSettings,
  type ProcessingSettings,
} from './processing/settings.js'
export { createRuntime, type Runtime } from './runtime.js'
export { createJsonFileSlideStore } from './store/json-file.js'
export { createMemorySlideStore } from './store/memory.js'
export type { SlideRecord, SlideStore, TextExtractRecord, VideoRecord } from './store/types.js'
export { summarizeTranscript } from './summary/route.js'
export { createSegmentTextPipeline, type SegmentText } from './text/segment-text.js'
