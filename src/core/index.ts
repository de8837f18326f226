/**
 * Core module exports
 */

export {
  FunnelstatError,
  ValidationError,
  InvalidInputError,
  ErrorCode,
  isFunnelstatError,
  wrapError,
} from './errors';

export * from './config';

export * from './data';

export { standardNormalCdf, twoTailedPValue } from './math/normal';
export { RNG } from './math/random';
