import type { Domain, DomainFilter, PipelineConfig } from "../types.js";
import { ConfigError } from "../utils/errors.js";

export function hasFilter(filter: DomainFilter): boolean {
  return Boolean(filter.domain || filter.group || filter.subgroup);
}

export function describeFilter(filter: DomainFilter): string {
  const parts: string[] = [];
  if (filter.domain) parts.push(`domain '${filter.domain}'`);
  if (filter.group) parts.push(`group '${filter.group}'`);
  if (filter.subgroup) parts.push(`subgroup '${filter.subgroup}'`);
  return parts.join(", ");
}

export function matchesFilter(domain: Domain, filter: DomainFilter): boolean {
  if (filter.domain && domain.name !== filter.domain) return false;
  if (filter.group && domain.group !== filter.group) return false;
  if (filter.subgroup && domain.subgroup !== filter.subgroup) return false;
  return true;
}

/**
 * Domains matching every given constraint, in config order. A filter that
 * matches nothing is a configuration mistake, not an empty run.
 */
export function selectDomains(config: PipelineConfig, filter: DomainFilter = {}): Domain[] {
  const selected = config.domains.filter((domain) => matchesFilter(domain, filter));
  if (selected.length === 0) {
    throw new ConfigError(`No domains match ${describeFilter(filter)}`, {
      domain: filter.domain,
      group: filter.group,
      subgroup: filter.subgroup,
    });
  }
  return selected;
}
