import { z } from 'zod';

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() }))
});

export interface ModelAvailability {
  readonly reachable: boolean;
  readonly available: boolean;
  readonly model: string;
  readonly models: readonly string[];
  readonly error?: string;
}

export interface CheckModelAvailabilityOptions {
  readonly baseUrl: string;
  readonly model: string;
  readonly timeoutMs?: number;
  readonly fetch?: typeof fetch;
}

export const checkModelAvailability = async (
  options: CheckModelAvailabilityOptions
): Promise<ModelAvailability> => {
  const fetchImpl = options.fetch ?? fetch;
  const url = `${options.baseUrl.replace(/\/+$/, '')}/models`;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(options.timeoutMs ?? 5_000)
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { reachable: false, available: false, model: options.model, models: [], error: message };
  }

  if (!response.ok) {
    return {
      reachable: false,
      available: false,
      model: options.model,
      models: [],
      error: `Model server responded with ${response.status} ${response.statusText}`
    };
  }

  const body: unknown = await response.json().catch(() => undefined);
  const parsed = ModelListSchema.safeParse(body);
  if (!parsed.success) {
    return {
      reachable: true,
      available: false,
      model: options.model,
      models: [],
      error: 'Model server returned an unexpected model list'
    };
  }

  const models = parsed.data.data.map((entry) => entry.id);
  return { reachable: true, available: models.includes(options.model), model: options.model, models };
};
