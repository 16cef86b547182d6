import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";
import type { Root, Type } from "protobufjs";
import type { IPayloadDecoder } from "@cloudlog/adapters-common";
import { structToObject, type StructLike } from "./entry-converter";

export const AUDIT_LOG_TYPE_URL = "type.googleapis.com/google.cloud.audit.AuditLog";

const STRUCT_TYPE = ".google.protobuf.Struct";

const PROTO_FILE = fileURLToPath(new URL("../../protos/audit_log.proto", import.meta.url));

export function loadPayloadProtos(): Root {
  const root = protobuf.loadSync(PROTO_FILE);
  root.resolveAll();
  return root;
}

/**
 * Decodes `protoPayload` values of the types registered on it.
 * Audit logs are registered by default.
 */
export class ProtoPayloadDecoder implements IPayloadDecoder {
  private readonly types = new Map<string, Type>();

  constructor(root: Root = loadPayloadProtos()) {
    this.register(AUDIT_LOG_TYPE_URL, root.lookupType("google.cloud.audit.AuditLog"));
  }

  register(typeUrl: string, type: Type): void {
    this.types.set(typeUrl, type);
  }

  decode(typeUrl: string, value: Uint8Array): Record<string, unknown> {
    const type = this.types.get(typeUrl);
    if (!type) {
      throw new Error(`unsupported payload type "${typeUrl}"`);
    }

    const message = type.decode(value);
    const object = type.toObject(message, {
      longs: String,
      enums: String,
      bytes: String,
    });
    return unwrapStructs(type, object);
  }
}

// Struct fields come out of toObject as {fields: {...}}; replace them with plain objects.
function unwrapStructs(type: Type, object: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...object };

  for (const field of type.fieldsArray) {
    const value = result[field.name];
    if (value === undefined || value === null) continue;

    const nested = field.resolvedType;
    if (!nested || !(nested instanceof protobuf.Type)) continue;

    if (nested.fullName === STRUCT_TYPE) {
      result[field.name] = isStruct(value) ? structToObject(value) : value;
    } else if (field.repeated && Array.isArray(value)) {
      result[field.name] = value.map((item) => (isRecord(item) ? unwrapStructs(nested, item) : item));
    } else if (isRecord(value)) {
      result[field.name] = unwrapStructs(nested, value);
    }
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStruct(value: unknown): value is StructLike {
  return isRecord(value) && (value.fields === undefined || isRecord(value.fields));
}
