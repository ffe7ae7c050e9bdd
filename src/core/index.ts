/**
 * 코어 모듈 진입점
 */

export {
  BUCKET_PREFIXES,
  isPrimaryNeeds,
  isWorking,
  isOther,
  classify,
  bucketOf,
} from './ColumnClassifier';

export {
  TimeUsageError,
  LoadError,
  SchemaError,
  PipelineError,
  ConfigError,
} from './errors';
export type { TimeUsageErrorCode } from './errors';
