import { z } from "zod";

export const AuthenticationTypeSchema = z.enum(["jwt", "gce"]);
export type AuthenticationType = z.infer<typeof AuthenticationTypeSchema>;

/**
 * Datasource settings as saved by the configuration editor.
 * The private key is stored separately as a secure value. Unknown keys
 * (such as the editor's tokenUri) are stripped.
 */
export const DatasourceSettingsSchema = z.object({
  authenticationType: AuthenticationTypeSchema.default("jwt"),
  clientEmail: z.string().default(""),
  defaultProject: z.string().default(""),
});
export type DatasourceSettings = z.infer<typeof DatasourceSettingsSchema>;

export const SecureSettingsSchema = z.object({
  privateKey: z.string().optional(),
});
export type SecureSettings = z.infer<typeof SecureSettingsSchema>;
