/**
 * Test helpers for building metadata environments
 */

import type { MetadataEnvironment } from '../../src/types/index.js';

export function makeEnvironment(
  overrides: Partial<Omit<MetadataEnvironment, 'options'>> & { options?: Record<string, unknown> } = {}
): MetadataEnvironment {
  const { options, ...rest } = overrides;
  return {
    tags: [],
    ...rest,
    options: new Map(Object.entries(options ?? {})),
  };
}
