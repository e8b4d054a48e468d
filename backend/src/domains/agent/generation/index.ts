export {
  RetryingGenerator,
  DEFAULT_GENERATION_MAX_RETRIES,
  DEFAULT_GENERATION_BASE_DELAY_MS,
} from './RetryingGenerator';
export type {
  RetryingGeneratorOptions,
  GenerateOptions,
  GenerationInputs,
} from './RetryingGenerator';
