export { processPresentation } from './presentationJob.js';
export { processVideo } from './videoJob.js';
export {
  runBatch,
  processJob,
  planBatch,
  discoverInputs,
  summarize,
  tallyAssets,
  INPUT_EXTENSIONS,
  type JobProcessor,
} from './batch.js';
export { mayWriteOutput, type JobDeps, type ConfirmOverwrite } from './context.js';
