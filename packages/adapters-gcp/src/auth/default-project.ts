import { GoogleAuth } from "google-auth-library";
import { withAbort, type CallOptions, type DefaultProjectResolver } from "@cloudlog/adapters-common";

/**
 * Resolve the project of the running environment from Application Default
 * Credentials (metadata server on GCE, GOOGLE_CLOUD_PROJECT, gcloud config).
 */
export function createGceDefaultProjectResolver(
  auth: Pick<GoogleAuth, "getProjectId"> = new GoogleAuth()
): DefaultProjectResolver {
  return async (options?: CallOptions) =>
    withAbort(auth.getProjectId(), options?.signal, "resolving default project");
}
