/**
 * Decodes serialized proto payloads into plain objects.
 *
 * `decode` is synchronous and throws when the type is unknown or the
 * bytes do not parse.
 */
export interface IPayloadDecoder {
  decode(typeUrl: string, value: Uint8Array): Record<string, unknown>;
}
