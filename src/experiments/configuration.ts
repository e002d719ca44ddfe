import type { ModelConfiguration, ResolvedConfiguration } from './types.js';

export const CONFIGURATION_PREFIX = 'vote-extraction';

/**
 * Stable identity for a configuration: the explicit id, otherwise
 * `vote-extraction-<nameSuffix>` or `vote-extraction-<modelKey>-t<temperature>`
 */
export function configurationId(config: ModelConfiguration): string {
  if (config.id) return config.id;
  const suffix = config.nameSuffix ?? `${config.modelKey}-t${config.temperature ?? 0}`;
  return `${CONFIGURATION_PREFIX}-${suffix}`;
}

export function resolveConfiguration(config: ModelConfiguration): ResolvedConfiguration {
  return {
    id: configurationId(config),
    modelKey: config.modelKey,
    temperature: config.temperature ?? 0,
    metadata: config.metadata ?? {},
  };
}

/**
 * Resolve a list, rejecting duplicate identities since results are keyed by id
 */
export function resolveConfigurations(configs: readonly ModelConfiguration[]): ResolvedConfiguration[] {
  const resolved = configs.map(resolveConfiguration);
  const seen = new Set<string>();
  for (const config of resolved) {
    if (seen.has(config.id)) {
      throw new Error(`Duplicate configuration id: ${config.id}`);
    }
    seen.add(config.id);
  }
  return resolved;
}
