/**
 * @fileoverview Composes the application container. Registration runs once;
 * later calls are no-ops.
 * @module src/container/index
 */
import { container } from './core/container.js';
import { registerCoreServices } from './registrations/core.js';

let composed = false;

export const composeContainer = (): void => {
  if (composed) return;
  registerCoreServices();
  composed = true;
};

export { container };
