import { describe, it, expect, vi } from "vitest";
import { CancelledError } from "@cloudlog/adapters-common";
import { createGceDefaultProjectResolver } from "../auth/default-project";

describe("createGceDefaultProjectResolver", () => {
  it("returns the project from application default credentials", async () => {
    const auth = { getProjectId: vi.fn().mockResolvedValue("gce-project") };

    await expect(createGceDefaultProjectResolver(auth)()).resolves.toBe("gce-project");
  });

  it("propagates lookup failures", async () => {
    const auth = { getProjectId: vi.fn().mockRejectedValue(new Error("Unable to detect a Project Id")) };

    await expect(createGceDefaultProjectResolver(auth)()).rejects.toThrow("Unable to detect a Project Id");
  });

  it("stops waiting once the signal fires", async () => {
    const auth = { getProjectId: vi.fn().mockReturnValue(new Promise<string>(() => undefined)) };
    const controller = new AbortController();

    const pending = createGceDefaultProjectResolver(auth)({ signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
