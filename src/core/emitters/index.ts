/**
 * Model emitters barrel export
 */

import type { EmitTarget } from '../../utils/config-schemas.js';
import { PhpEmitter } from './php-emitter.js';
import { TypeScriptEmitter } from './typescript-emitter.js';
import type { ModelEmitter } from './types.js';

export * from './types.js';
export { TypeScriptEmitter, type TypeScriptEmitterOptions } from './typescript-emitter.js';
export { PhpEmitter, type PhpEmitterOptions } from './php-emitter.js';

/**
 * Emitter for a command-line target name
 */
export function createEmitter(target: EmitTarget): ModelEmitter {
  switch (target) {
    case 'php':
      return new PhpEmitter();
    case 'ts':
      return new TypeScriptEmitter();
  }
}
