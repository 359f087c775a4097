/**
 * Typed list filters.
 *
 * The Engine API takes filters as one `filters` query parameter holding the
 * JSON encoding of `{ [kind]: string[] }`. Filters are kept as a flat list of
 * `{ kind, value }` records and grouped per kind only when serialized, so
 * filters added over several calls always encode as their union.
 */

export interface Filter<K extends string = string> {
  readonly kind: K;
  readonly value: string;
}

export type FilterMap = Record<string, string[]>;

/**
 * Group filters by kind, keeping the order in which values were given.
 */
export function groupFilters(filters: readonly Filter[]): FilterMap {
  const grouped: FilterMap = {};
  for (const { kind, value } of filters) {
    const values = grouped[kind];
    if (values) {
      values.push(value);
    } else {
      grouped[kind] = [value];
    }
  }
  return grouped;
}

/**
 * Serialize filters for the `filters` query parameter. Empty lists are unset.
 */
export function encodeFilters(filters: readonly Filter[] | undefined): string | undefined {
  if (!filters || filters.length === 0) {
    return undefined;
  }
  return JSON.stringify(groupFilters(filters));
}

/**
 * Return a copy of `options` whose filters are the existing ones followed by `more`.
 */
export function withFilters<T extends { readonly filters?: readonly Filter[] }>(
  options: T,
  more: NonNullable<T['filters']>,
): T {
  return { ...options, filters: [...(options.filters ?? []), ...more] };
}

const filter = <K extends string>(kind: K, value: string): Filter<K> => ({ kind, value });

const labelFilters = {
  /** Match objects carrying a label, whatever its value */
  labelName: (name: string) => filter('label', name),
  /** Match objects whose label has the given value */
  label: (name: string, value: string) => filter('label', `${name}=${value}`),
};

export const ContainerFilter = {
  ...labelFilters,
  ancestor: (image: string) => filter('ancestor', image),
  before: (container: string) => filter('before', container),
  expose: (port: string) => filter('expose', port),
  exitCode: (code: number) => filter('exited', String(code)),
  health: (state: 'starting' | 'healthy' | 'unhealthy' | 'none') => filter('health', state),
  id: (id: string) => filter('id', id),
  isolation: (isolation: 'default' | 'process' | 'hyperv') => filter('isolation', isolation),
  isTask: (isTask: boolean) => filter('is-task', String(isTask)),
  name: (name: string) => filter('name', name),
  network: (network: string) => filter('network', network),
  publish: (port: string) => filter('publish', port),
  since: (container: string) => filter('since', container),
  status: (
    status: 'created' | 'restarting' | 'running' | 'removing' | 'paused' | 'exited' | 'dead',
  ) => filter('status', status),
  volume: (volume: string) => filter('volume', volume),
};

export const ImageFilter = {
  ...labelFilters,
  before: (image: string) => filter('before', image),
  dangling: (dangling = true) => filter('dangling', String(dangling)),
  reference: (reference: string) => filter('reference', reference),
  since: (image: string) => filter('since', image),
};

export const ImageSearchFilter = {
  isAutomated: (automated: boolean) => filter('is-automated', String(automated)),
  isOfficial: (official: boolean) => filter('is-official', String(official)),
  stars: (minimum: number) => filter('stars', String(minimum)),
};

export const VolumeFilter = {
  ...labelFilters,
  dangling: (dangling = true) => filter('dangling', String(dangling)),
  driver: (driver: string) => filter('driver', driver),
  name: (name: string) => filter('name', name),
};

export const NetworkFilter = {
  ...labelFilters,
  dangling: (dangling = true) => filter('dangling', String(dangling)),
  driver: (driver: string) => filter('driver', driver),
  id: (id: string) => filter('id', id),
  name: (name: string) => filter('name', name),
  scope: (scope: 'swarm' | 'global' | 'local') => filter('scope', scope),
  type: (type: 'custom' | 'builtin') => filter('type', type),
};

export const ServiceFilter = {
  ...labelFilters,
  id: (id: string) => filter('id', id),
  mode: (mode: 'replicated' | 'global') => filter('mode', mode),
  name: (name: string) => filter('name', name),
};

export type EventType =
  | 'container'
  | 'image'
  | 'volume'
  | 'network'
  | 'daemon'
  | 'plugin'
  | 'node'
  | 'service'
  | 'secret'
  | 'config';

export const EventFilter = {
  label: (label: string) => filter('label', label),
  config: (config: string) => filter('config', config),
  container: (container: string) => filter('container', container),
  daemon: (daemon: string) => filter('daemon', daemon),
  event: (event: string) => filter('event', event),
  image: (image: string) => filter('image', image),
  network: (network: string) => filter('network', network),
  node: (node: string) => filter('node', node),
  plugin: (plugin: string) => filter('plugin', plugin),
  scope: (scope: 'local' | 'swarm') => filter('scope', scope),
  secret: (secret: string) => filter('secret', secret),
  service: (service: string) => filter('service', service),
  type: (type: EventType) => filter('type', type),
  volume: (volume: string) => filter('volume', volume),
};

export const PruneFilter = {
  ...labelFilters,
  /** Exclude labels instead of matching them */
  labelNot: (name: string, value?: string) =>
    filter('label!', value === undefined ? name : `${name}=${value}`),
  until: (timestamp: string) => filter('until', timestamp),
  dangling: (dangling = true) => filter('dangling', String(dangling)),
};

type KindOf<T> = {
  [P in keyof T]: T[P] extends (...args: never[]) => Filter<infer K> ? K : never;
}[keyof T];

export type ContainerFilterKind = KindOf<typeof ContainerFilter>;
export type ImageFilterKind = KindOf<typeof ImageFilter>;
export type ImageSearchFilterKind = KindOf<typeof ImageSearchFilter>;
export type VolumeFilterKind = KindOf<typeof VolumeFilter>;
export type NetworkFilterKind = KindOf<typeof NetworkFilter>;
export type ServiceFilterKind = KindOf<typeof ServiceFilter>;
export type EventFilterKind = KindOf<typeof EventFilter>;
export type PruneFilterKind = KindOf<typeof PruneFilter>;

/** Every kind each family accepts, used to validate filters arriving as raw JSON. */
export const FILTER_KINDS: {
  readonly containers: readonly ContainerFilterKind[];
  readonly images: readonly ImageFilterKind[];
  readonly imageSearch: readonly ImageSearchFilterKind[];
  readonly volumes: readonly VolumeFilterKind[];
  readonly networks: readonly NetworkFilterKind[];
  readonly services: readonly ServiceFilterKind[];
  readonly events: readonly EventFilterKind[];
  readonly prune: readonly PruneFilterKind[];
} = {
  containers: [
    'label', 'ancestor', 'before', 'expose', 'exited', 'health', 'id', 'isolation',
    'is-task', 'name', 'network', 'publish', 'since', 'status', 'volume',
  ],
  images: ['label', 'before', 'dangling', 'reference', 'since'],
  imageSearch: ['is-automated', 'is-official', 'stars'],
  volumes: ['label', 'dangling', 'driver', 'name'],
  networks: ['label', 'dangling', 'driver', 'id', 'name', 'scope', 'type'],
  services: ['label', 'id', 'mode', 'name'],
  events: [
    'label', 'config', 'container', 'daemon', 'event', 'image', 'network', 'node',
    'plugin', 'scope', 'secret', 'service', 'type', 'volume',
  ],
  prune: ['label', 'label!', 'until', 'dangling'],
};
