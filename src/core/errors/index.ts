export {
  CaliperError,
  ErrorCode,
  isCaliperError,
  wrapError,
  missingColumnError,
} from './CaliperError';
export type { ErrorContext } from './CaliperError';
