/**
 * Model Code Generator
 *
 * Deterministic transformation from a resource to the source text of one
 * model class. The target language lives behind `ModelEmitter`; this class
 * only adds output path resolution.
 */

import * as path from 'node:path';
import type { ApiResource } from '../types/api-resource.js';
import { TypeScriptEmitter } from './emitters/typescript-emitter.js';
import type { ModelEmitter } from './emitters/types.js';

export class ModelGenerator {
  constructor(private readonly emitter: ModelEmitter = new TypeScriptEmitter()) {}

  get target(): string {
    return this.emitter.target;
  }

  /**
   * Source text for the resource's model class. Same resource, same bytes.
   *
   * @throws GenerationError when the resource cannot be expressed in the target language
   */
  generate(resource: ApiResource): string {
    return this.emitter.emit(resource);
  }

  /**
   * Path of the generated file under `outputDirectory`
   */
  outputPath(resource: ApiResource, outputDirectory: string): string {
    return path.join(outputDirectory, ...this.emitter.relativePath(resource).split('/'));
  }
}
