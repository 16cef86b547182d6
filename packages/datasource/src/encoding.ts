import { EncodingError } from "@cloudlog/adapters-common";

/**
 * JSON.stringify that fails loudly.
 *
 * @throws EncodingError for values without a JSON form (BigInt, cycles, undefined)
 */
export function encodeJson(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch (err) {
    throw new EncodingError("failed encoding response", err);
  }
  if (json === undefined) {
    throw new EncodingError("failed encoding response: value has no JSON representation");
  }
  return json;
}
