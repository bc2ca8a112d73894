/**
 * EFFECTS LAYER
 *
 * The only IO in the store is writing lines. Processors and the entry point
 * write through this interface rather than the global console, so tests
 * hand in a recording implementation.
 */

export interface ConsoleService {
  log(line: string): void;
  error(message: string, cause?: unknown): void;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type StoreEffects = {
  readonly console: ConsoleService;
}
