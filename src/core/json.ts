export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
