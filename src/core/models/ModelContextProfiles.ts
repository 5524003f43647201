/**
 * Context window sizes per model family.
 *
 * Lookup order: exact model id, the id without its tag (`llama3.2:1b` →
 * `llama3.2`), then the longest family prefix. Anything else gets the default.
 */
export const DEFAULT_CONTEXT_LIMIT = 4096;

const BUILT_IN_LIMITS: Readonly<Record<string, number>> = {
  llama2: 4096,
  llama3: 8192,
  'llama3.1': 8192,
  'llama3.2': 8192,
  mistral: 8192,
  mixtral: 32768,
  gemma: 8192,
  gemma2: 8192,
  gemma3: 8192,
  qwen2: 32768,
  'qwen2.5': 32768,
  phi3: 4096,
  'deepseek-r1': 8192,
  'command-r': 8192,
  'gpt-4': 8192,
  'gpt-4-32k': 32768,
  'gpt-3.5-turbo': 4096,
  'gpt-3.5-turbo-16k': 16384,
};

export class ModelContextProfiles {
  private readonly limits: ReadonlyMap<string, number>;
  private readonly families: readonly string[];

  constructor(
    overrides: Readonly<Record<string, number>> = {},
    readonly defaultLimit: number = DEFAULT_CONTEXT_LIMIT
  ) {
    const merged = new Map<string, number>();
    for (const [model, limit] of Object.entries({ ...BUILT_IN_LIMITS, ...overrides })) {
      if (Number.isInteger(limit) && limit > 0) {
        merged.set(model.toLowerCase(), limit);
      }
    }
    this.limits = merged;
    // Longest first so `llama3.2` wins over `llama3`
    this.families = [...merged.keys()].sort((a, b) => b.length - a.length);
    Object.freeze(this);
  }

  limitFor(modelId: string): number {
    const id = modelId.trim().toLowerCase();
    const exact = this.limits.get(id);
    if (exact !== undefined) {
      return exact;
    }

    const base = id.split(':')[0];
    const byBase = this.limits.get(base);
    if (byBase !== undefined) {
      return byBase;
    }

    const family = this.families.find((name) => base.startsWith(name));
    return family !== undefined ? (this.limits.get(family) ?? this.defaultLimit) : this.defaultLimit;
  }
}

// Global instance
let profilesInstance: ModelContextProfiles | null = null;

export function initializeModelProfiles(
  overrides?: Readonly<Record<string, number>>,
  defaultLimit?: number
): ModelContextProfiles {
  if (!profilesInstance) {
    profilesInstance = new ModelContextProfiles(overrides, defaultLimit);
  }
  return profilesInstance;
}

export function getModelProfiles(): ModelContextProfiles {
  return profilesInstance ?? initializeModelProfiles();
}
