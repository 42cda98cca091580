import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

let home: string;
let store: typeof import("../store.js");
let credentials: typeof import("../credentials.js");

beforeAll(async () => {
  home = await fs.mkdtemp(path.join(os.tmpdir(), "mecaller-store-"));
  process.env.MECALLER_HOME = home;
  delete process.env.MECALLER_PROFILE;
  // APP_HOME is read when the module loads.
  store = await import("../store.js");
  credentials = await import("../credentials.js");
});

afterAll(async () => {
  delete process.env.MECALLER_HOME;
  await fs.rm(home, { recursive: true, force: true });
});

describe("profiles", () => {
  it("seeds a default profile under MECALLER_HOME", async () => {
    expect(store.APP_HOME).toBe(home);

    const db = await store.listProfiles();

    expect(db.defaultProfile).toBe("default");
    expect(Object.keys(db.profiles)).toEqual(["default"]);
    await expect(store.resolveProfileName()).resolves.toBe("default");
  });

  it("adds, labels and switches profiles", async () => {
    await store.addProfile("work");
    await store.setProfileLabel("work", "Office phone");
    await store.setDefaultProfile("work");

    const db = await store.listProfiles();
    expect(db.defaultProfile).toBe("work");
    expect(db.profiles.work?.label).toBe("Office phone");
    await expect(store.resolveProfileName()).resolves.toBe("work");
    await expect(store.resolveProfileName("default")).resolves.toBe("default");
  });

  it("rejects duplicate and malformed names", async () => {
    await expect(store.addProfile("work")).rejects.toThrow('Profile "work" already exists.');
    await expect(store.addProfile("two words")).rejects.toThrow("Invalid profile name.");
    await expect(store.resolveProfileName("ghost")).rejects.toThrow(
      'Profile "ghost" does not exist. Create it with: account add ghost',
    );
  });

  it("honours MECALLER_PROFILE", async () => {
    process.env.MECALLER_PROFILE = "default";
    try {
      await expect(store.resolveProfileName()).resolves.toBe("default");
    } finally {
      delete process.env.MECALLER_PROFILE;
    }
  });
});

describe("credentials", () => {
  it("saves tokens privately and records the phone", async () => {
    await store.saveCredentials("work", {
      phoneNumber: "972501234567",
      access: "test-access",
      refresh: "test-refresh",
    });

    const saved = await store.loadCredentials("work");
    expect(saved).toMatchObject({
      phoneNumber: "972501234567",
      access: "test-access",
      refresh: "test-refresh",
    });
    const stat = await fs.stat(store.getCredentialsPath("work"));
    expect(stat.mode & 0o777).toBe(0o600);
    expect((await store.listProfiles()).profiles.work?.phoneNumber).toBe("972501234567");
  });

  it("only serves the number the tokens belong to", async () => {
    const manager = new credentials.ProfileCredentialsManager("work");

    await expect(manager.get("12125550100")).resolves.toBeNull();
    await manager.update("972501234567", "test-access-2");

    expect(await manager.get("972501234567")).toEqual({
      access: "test-access-2",
      refresh: "test-refresh",
      pwdToken: undefined,
    });

    await manager.delete("12125550100");
    expect(await store.loadCredentials("work")).not.toBeNull();
    await manager.delete("972501234567");
    expect(await store.loadCredentials("work")).toBeNull();
  });

  it("refuses a credentials file it cannot read", async () => {
    await fs.writeFile(store.getCredentialsPath("work"), JSON.stringify({ access: 1 }));
    await expect(store.loadCredentials("work")).rejects.toThrow(
      'Credentials for profile "work" are unreadable. Run: auth logout, then log in again.',
    );
    await store.clearCredentials("work");
  });

  it("falls back to a remaining profile when the default is removed", async () => {
    await store.removeProfile("work");

    const db = await store.listProfiles();
    expect(db.defaultProfile).toBe("default");
    expect(Object.keys(db.profiles)).toEqual(["default"]);
  });
});
