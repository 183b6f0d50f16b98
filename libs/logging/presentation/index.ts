export { ErrorNormalizer } from './normalizers/error.normalizer';
export type { NormalizedError } from './normalizers/error.normalizer';
