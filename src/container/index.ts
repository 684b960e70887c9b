/**
 * @fileoverview Registers application services with the tsyringe container.
 * Classes decorated with `@injectable()` resolve themselves; only tokens bound to
 * values or interfaces are registered here.
 * @module src/container/index
 */
import { container } from 'tsyringe';

import { config } from '@/config/index.js';
import {
  AppConfig,
  StructurePipelineService,
  StructureSource,
} from '@/container/tokens.js';
import {
  RcsbStructureSource,
  StructurePipelineService as StructurePipelineServiceClass,
} from '@/services/structure/index.js';

let composed = false;

export function composeContainer(): void {
  if (composed) return;

  container.register(AppConfig, { useValue: config });
  container.registerSingleton(StructureSource, RcsbStructureSource);
  container.registerSingleton(StructurePipelineService, StructurePipelineServiceClass);

  composed = true;
}

export { container };
