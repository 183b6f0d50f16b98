/**
 * Public API exports for the logging library.
 * This allows clean imports: import { LoggingModule, LoggingUseCase } from '@logging'
 */

// Module
export { LoggingModule } from './logging.module';

// Ports
export { LoggingUseCase } from './core/ports/in';
export type { LoggingStats } from './core/ports/in';

// Services
export { LoggingService } from './service/logging.service';

// Errors
export { ErrorNormalizer } from './presentation/normalizers/error.normalizer';
export type { NormalizedError } from './presentation/normalizers/error.normalizer';
