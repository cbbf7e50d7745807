export type HierarchyManagerOptions = {
  maxChainsPerRack?: number;
  /** Depth ceiling for integrity walks and ancestor walks. */
  maxDepth?: number;
  /** Scans per `resolve` call when the host returned unreadable entries. */
  resolveAttempts?: number;
  containerPlugin?: string;
  mixerPlugin?: string;
  utilityPlugin?: string;
  modulatorPlugin?: string;
  defaultRackLabel?: string;
  debug?: boolean;
  log?: (line: string) => void;
};

export type ResolvedManagerOptions = Required<HierarchyManagerOptions>;

export const DEFAULT_MAX_CHAINS_PER_RACK = 31;
export const DEFAULT_MAX_DEPTH = 32;
export const DEFAULT_RESOLVE_ATTEMPTS = 2;

function positiveInt(value: number | undefined, fallback: number, field: string): number {
  const v = value ?? fallback;
  if (!Number.isSafeInteger(v) || v <= 0) throw new Error(`invalid ${field}: ${value}`);
  return v;
}

function nonEmpty(value: string | undefined, fallback: string, field: string): string {
  const v = value ?? fallback;
  if (v.trim().length === 0) throw new Error(`invalid ${field}: ${JSON.stringify(value)}`);
  return v;
}

export function resolveManagerOptions(opts: HierarchyManagerOptions = {}): ResolvedManagerOptions {
  return {
    maxChainsPerRack: positiveInt(opts.maxChainsPerRack, DEFAULT_MAX_CHAINS_PER_RACK, "maxChainsPerRack"),
    maxDepth: positiveInt(opts.maxDepth, DEFAULT_MAX_DEPTH, "maxDepth"),
    resolveAttempts: positiveInt(opts.resolveAttempts, DEFAULT_RESOLVE_ATTEMPTS, "resolveAttempts"),
    containerPlugin: nonEmpty(opts.containerPlugin, "Container", "containerPlugin"),
    mixerPlugin: nonEmpty(opts.mixerPlugin, "JS: fxrack/fxrack_mixer", "mixerPlugin"),
    utilityPlugin: nonEmpty(opts.utilityPlugin, "JS: fxrack/fxrack_utility", "utilityPlugin"),
    modulatorPlugin: nonEmpty(opts.modulatorPlugin, "JS: fxrack/fxrack_modulator", "modulatorPlugin"),
    defaultRackLabel: opts.defaultRackLabel ?? "Rack",
    debug: Boolean(opts.debug),
    log: opts.log ?? ((line) => console.debug(line)),
  };
}
