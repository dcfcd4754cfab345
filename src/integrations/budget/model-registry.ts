/**
 * Context-window limits per model.
 *
 * Lookup is exact first, then by longest registered prefix, so dated
 * releases (`claude-3-5-sonnet-20241022`) and provider-qualified ids
 * (`anthropic/claude-3-opus`) resolve to their family.
 */

export interface ModelLimits {
  modelId: string;
  maxContextTokens: number;
  /** Tokens held back for the model's reply */
  reservedOutputTokens: number;
}

/** Conservative window assumed for models not listed below */
export const DEFAULT_MODEL_LIMITS: Omit<ModelLimits, 'modelId'> = {
  maxContextTokens: 32_000,
  reservedOutputTokens: 4_096,
};

const DEFAULT_MODELS: ModelLimits[] = [
  // Anthropic
  { modelId: 'claude-3-5-sonnet', maxContextTokens: 200_000, reservedOutputTokens: 8_192 },
  { modelId: 'claude-3-5-haiku', maxContextTokens: 200_000, reservedOutputTokens: 8_192 },
  { modelId: 'claude-3-7-sonnet', maxContextTokens: 200_000, reservedOutputTokens: 8_192 },
  { modelId: 'claude-3-opus', maxContextTokens: 200_000, reservedOutputTokens: 4_096 },
  { modelId: 'claude-3-haiku', maxContextTokens: 200_000, reservedOutputTokens: 4_096 },
  { modelId: 'claude-sonnet-4', maxContextTokens: 200_000, reservedOutputTokens: 8_192 },
  { modelId: 'claude-opus-4', maxContextTokens: 200_000, reservedOutputTokens: 8_192 },
  // OpenAI
  { modelId: 'gpt-4o', maxContextTokens: 128_000, reservedOutputTokens: 16_384 },
  { modelId: 'gpt-4o-mini', maxContextTokens: 128_000, reservedOutputTokens: 16_384 },
  { modelId: 'gpt-4-turbo', maxContextTokens: 128_000, reservedOutputTokens: 4_096 },
  { modelId: 'gpt-4.1', maxContextTokens: 1_047_576, reservedOutputTokens: 32_768 },
  { modelId: 'gpt-4', maxContextTokens: 8_192, reservedOutputTokens: 2_048 },
  { modelId: 'gpt-3.5-turbo', maxContextTokens: 16_385, reservedOutputTokens: 4_096 },
  { modelId: 'o1', maxContextTokens: 200_000, reservedOutputTokens: 32_768 },
  { modelId: 'o3', maxContextTokens: 200_000, reservedOutputTokens: 32_768 },
  { modelId: 'o4-mini', maxContextTokens: 200_000, reservedOutputTokens: 32_768 },
];

export class ModelRegistry {
  private models = new Map<string, ModelLimits>();

  constructor(models: ModelLimits[] = DEFAULT_MODELS) {
    for (const model of models) {
      this.register(model);
    }
  }

  register(model: ModelLimits): void {
    this.models.set(model.modelId.toLowerCase(), model);
  }

  /**
   * Resolve limits for a model id, or undefined when unknown.
   */
  lookup(modelId: string): ModelLimits | undefined {
    let id = modelId.toLowerCase();
    const slash = id.lastIndexOf('/');
    if (slash >= 0) id = id.slice(slash + 1);

    const exact = this.models.get(id);
    if (exact) return exact;

    let best: ModelLimits | undefined;
    let bestLength = 0;
    for (const [key, model] of this.models) {
      if (id.startsWith(key) && key.length > bestLength) {
        best = model;
        bestLength = key.length;
      }
    }
    return best;
  }

  isKnown(modelId: string): boolean {
    return this.lookup(modelId) !== undefined;
  }

  /**
   * Limits for a model, falling back to DEFAULT_MODEL_LIMITS.
   */
  getLimits(modelId: string): ModelLimits {
    return this.lookup(modelId) ?? { modelId, ...DEFAULT_MODEL_LIMITS };
  }
}

export const modelRegistry = new ModelRegistry();
