import { z } from "zod";

export const DEFAULT_MODELS = [
  "gpt-4.1-mini",
  "claude-3-7-sonnet",
  "grok-3-mini",
  "qwen-qwq",
] as const;

// external (client-facing) name -> backend name
export const modelMappingSchema = z.record(z.string().min(1));
export type ModelMapping = z.infer<typeof modelMappingSchema>;

export interface ModelMapper {
  toBackendName(externalName: string): string;
  toExternalName(backendName: string): string;
}

export class StaticModelMapper implements ModelMapper {
  private readonly reverse: Map<string, string>;

  constructor(private readonly mapping: ModelMapping = {}) {
    this.reverse = new Map(
      Object.entries(mapping).map(([external, backend]) => [backend, external]),
    );
  }

  toBackendName(externalName: string): string {
    return this.mapping[externalName] ?? externalName;
  }

  toExternalName(backendName: string): string {
    return this.reverse.get(backendName) ?? backendName;
  }
}

export const modelSchema = z.object({
  id: z.string(),
  object: z.literal("model"),
  created: z.number(),
  owned_by: z.string(),
});
export type Model = z.infer<typeof modelSchema>;

export interface ModelList {
  object: "list";
  data: Model[];
}

export function toModelList(
  models: readonly string[],
  created: number,
  ownedBy = "linegate",
): ModelList {
  return {
    object: "list",
    data: models.map((id) => ({
      id,
      object: "model",
      created,
      owned_by: ownedBy,
    })),
  };
}
