/**
 * @fileoverview Container entry point. Registration is explicit and happens once,
 * from the application entry, through `composeContainer`.
 * @module src/container/index
 */
import { container } from './core/container.js';
import { registerCoreServices } from './registrations/core.js';
import { registerMcpServices } from './registrations/mcp.js';

export { container, Container, Token, token } from './core/container.js';
export * from './core/tokens.js';

let composed = false;

/**
 * Registers every service. Calling it again is a no-op.
 */
export function composeContainer(): void {
  if (composed) return;
  registerCoreServices();
  registerMcpServices();
  composed = true;
}

/** Clears all registrations so `composeContainer` can run again. Test-only. */
export function resetContainer(): void {
  container.reset();
  composed = false;
}
