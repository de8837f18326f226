export {
  FunnelstatError,
  ValidationError,
  InvalidInputError,
  ErrorCode,
  isFunnelstatError,
  wrapError,
} from './FunnelstatError';
export type { ErrorContext } from './FunnelstatError';
