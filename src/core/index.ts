/**
 * =============================================================================
 * CORE MODULE - Central Exports
 * =============================================================================
 *
 * Single entry point for all core functionality.
 *
 * USAGE:
 * ```typescript
 * import { Direction, ErrorCode, ParseError } from '../core';
 * ```
 *
 * =============================================================================
 */

// Constants & Enums
export * from './constants';

// Error Classes
export * from './errors/AppError';
