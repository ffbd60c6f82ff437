/**
 * Resource kinds shipped with Reliquary
 */
import type { ResourceType } from '@reliquary/types';
import { TextFile } from './TextFile.js';

export { TextFile };

/**
 * Registered by createRuntime() before any manifest is loaded.
 */
export const BUILTIN_RESOURCE_TYPES: readonly ResourceType[] = [TextFile];
