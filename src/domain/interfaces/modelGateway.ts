export type StructuredRecord = Record<string, unknown>;

export interface ModelGateway {
  readonly provider: string;
  readonly model: string;

  generate(prompt: string, temperature: number, signal?: AbortSignal): Promise<string>;

  extractStructured(responseText: string): StructuredRecord;
}
