/**
 * Runtime - the owning context for one registry
 *
 * Built once at start-up, passed to whatever needs the registry, and torn
 * down with dispose(). There is no global registry instance.
 */

import type { ResourceType } from '@reliquary/types';
import { ResourceRegistry } from './registry/ResourceRegistry.js';
import { BUILTIN_RESOURCE_TYPES } from './resources/index.js';
import { closeLogger, createLogger, type Logger, type LogLevel } from './logging/Logger.js';

export interface RuntimeOptions {
  logLevel?: LogLevel;
  logFile?: string;
  /** Use this logger instead of creating one; logLevel and logFile are ignored */
  logger?: Logger;
  /** Extra resource classes registered after the built-in ones */
  types?: readonly ResourceType[];
}

export interface Runtime {
  readonly registry: ResourceRegistry;
  readonly logger: Logger;
  /** Drop every instance and close file logging */
  dispose(): Promise<void>;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const ownsLogger = options.logger === undefined;
  const logger = options.logger
    ?? createLogger(options.logLevel ?? 'warnings', options.logFile ? { logFile: options.logFile } : undefined);

  const registry = new ResourceRegistry({ logger });
  for (const type of [...BUILTIN_RESOURCE_TYPES, ...(options.types ?? [])]) {
    registry.register(type);
  }

  return {
    registry,
    logger,
    async dispose() {
      registry.clear();
      if (ownsLogger) {
        await closeLogger(logger);
      }
    },
  };
}
