import { describe, expect, it } from "vitest";
import { z } from "zod";
import { MemoryCredentialsManager } from "../credentials.js";
import { ApiError, AuthError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { ACTIVATE_PATH, ASK_PATH, REFRESH_PATH, Session } from "../session.js";
import { createFakeAdapter, type FakeHandler } from "./fake-adapter.js";

const PHONE = "972501234567";
const settingsShape = z.object({ language: z.string() });

function sessionWith(handler: FakeHandler, tokens = true) {
  const { adapter, requests } = createFakeAdapter(handler);
  const manager = new MemoryCredentialsManager();
  const session = new Session({
    adapter,
    logger: silentLogger,
    credentialsManager: manager,
    phoneNumber: PHONE,
    credentials: tokens ? { access: "access-1", refresh: "refresh-1" } : null,
  });
  return { session, manager, requests };
}

const refreshCount = (requests: { url: string }[]) =>
  requests.filter((request) => request.url === REFRESH_PATH).length;

describe("Session.authenticate / verify", () => {
  const handler: FakeHandler = ({ url, body }) => {
    if (url === ASK_PATH) return { status: 200, body: { request_id: 77 } };
    if (url === ACTIVATE_PATH) {
      const activation = z.object({ activation_code: z.string() }).parse(body);
      return activation.activation_code === "1234"
        ? { status: 200, body: { access: "access-1", refresh: "refresh-1" } }
        : { status: 400, body: { detail: "Invalid code" } };
    }
    return { status: 404, body: {} };
  };

  it("exchanges the code for a token pair and persists it", async () => {
    const { session, manager, requests } = sessionWith(handler, false);

    const challengeId = await session.authenticate("+972 (50) 123-4567");
    expect(challengeId).toBe("77");
    expect(requests[0]).toMatchObject({
      method: "post",
      url: ASK_PATH,
      body: { phone_number: 972501234567, contact_type: "sms" },
    });
    expect(requests[0]?.authorization).toBeUndefined();

    const tokens = await session.verify(challengeId, "1234");
    expect(tokens).toEqual({ access: "access-1", refresh: "refresh-1" });
    expect(requests[1]?.body).toEqual({
      phone_number: 972501234567,
      activation_code: "1234",
      request_id: "77",
    });
    expect(session.isAuthenticated).toBe(true);
    expect(session.phoneNumber?.digits).toBe(PHONE);
    expect(await manager.get(PHONE)).toEqual({ access: "access-1", refresh: "refresh-1" });
  });

  it("asks for a phone call when requested", async () => {
    const { session, requests } = sessionWith(handler, false);
    await session.authenticate(PHONE, "call");
    expect(requests[0]?.body).toEqual({ phone_number: 972501234567, contact_type: "call" });
  });

  it("rejects a malformed code without sending it", async () => {
    const { session, requests } = sessionWith(handler, false);
    const challengeId = await session.authenticate(PHONE);

    await expect(session.verify(challengeId, "12ab")).rejects.toThrow(
      "Verification code must be 4 to 8 digits.",
    );
    expect(requests).toHaveLength(1);
    expect(session.getCredential()).toBeNull();
  });

  it("surfaces the vendor's reason when the code is wrong", async () => {
    const { session, manager } = sessionWith(handler, false);
    const challengeId = await session.authenticate(PHONE);

    const error = await session.verify(challengeId, "9999").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: "Verification failed: Invalid code", status: 400 });
    expect(session.isAuthenticated).toBe(false);
    expect(await manager.get(PHONE)).toBeNull();
  });

  it("leaves an existing credential alone when verification fails", async () => {
    const { session, manager } = sessionWith(handler);
    await manager.set(PHONE, { access: "access-old", refresh: "refresh-old" });
    session.useCredential({ access: "access-old", refresh: "refresh-old" });
    const challengeId = await session.authenticate(PHONE);

    await expect(session.verify(challengeId, "9999")).rejects.toBeInstanceOf(AuthError);
    await expect(session.verify(challengeId, "12ab")).rejects.toBeInstanceOf(AuthError);

    expect(session.getCredential()).toEqual({ access: "access-old", refresh: "refresh-old" });
    expect(await manager.get(PHONE)).toEqual({ access: "access-old", refresh: "refresh-old" });
  });

  it("rejects an unknown challenge", async () => {
    const { session, requests } = sessionWith(handler, false);
    await expect(session.verify("nope", "1234")).rejects.toThrow(
      'Unknown challenge "nope". Call authenticate() first.',
    );
    expect(requests).toHaveLength(0);
  });

  it("verifies a challenge resumed from another process", async () => {
    const { session } = sessionWith(handler, false);
    session.resumeChallenge("77", `+${PHONE}`);
    await expect(session.verify("77", 1234)).resolves.toEqual({
      access: "access-1",
      refresh: "refresh-1",
    });
  });

  it("rejects a malformed phone number before any request", async () => {
    const { session, requests } = sessionWith(handler, false);
    await expect(session.authenticate("12")).rejects.toBeInstanceOf(AuthError);
    expect(requests).toHaveLength(0);
  });

  it("fails when the challenge response has no id", async () => {
    const { session } = sessionWith(() => ({ status: 200, body: {} }), false);
    await expect(session.authenticate(PHONE)).rejects.toThrow(
      "Verification request returned no challenge id.",
    );
  });
});

describe("Session.request", () => {
  it("refuses to send without credentials", async () => {
    const { session, requests } = sessionWith(() => ({ status: 200, body: {} }), false);
    await expect(
      session.request("get", "/main/settings/", { schema: settingsShape }),
    ).rejects.toBeInstanceOf(AuthError);
    expect(requests).toHaveLength(0);
  });

  it("sends the bearer token and query", async () => {
    const { session, requests } = sessionWith(() => ({ status: 200, body: { language: "en" } }));

    const result = await session.request("get", "/main/settings/", {
      query: { page: 2 },
      schema: settingsShape,
    });

    expect(result).toEqual({ language: "en" });
    expect(requests[0]).toMatchObject({
      method: "get",
      url: "/main/settings/",
      params: { page: 2 },
      authorization: "Bearer access-1",
    });
  });

  it("refreshes once on 401 and retries with the new token", async () => {
    const { session, manager, requests } = sessionWith(({ url, authorization }) => {
      if (url === REFRESH_PATH) return { status: 200, body: { access: "access-2" } };
      return authorization === "Bearer access-2"
        ? { status: 200, body: { language: "en" } }
        : { status: 401, body: { detail: "Token expired" } };
    });
    await manager.set(PHONE, { access: "access-1", refresh: "refresh-1" });

    const result = await session.request("get", "/main/settings/", { schema: settingsShape });

    expect(result).toEqual({ language: "en" });
    expect(requests.map((request) => request.url)).toEqual([
      "/main/settings/",
      REFRESH_PATH,
      "/main/settings/",
    ]);
    expect(requests[1]?.body).toEqual({ refresh: "refresh-1" });
    expect(requests[1]?.authorization).toBeUndefined();
    expect(session.getCredential()).toEqual({ access: "access-2", refresh: "refresh-1" });
    expect(await manager.get(PHONE)).toEqual({ access: "access-2", refresh: "refresh-1" });
  });

  it("keeps a rotated refresh token", async () => {
    const { session } = sessionWith(({ url, authorization }) => {
      if (url === REFRESH_PATH) {
        return { status: 200, body: { access: "access-2", refresh: "refresh-2" } };
      }
      return authorization === "Bearer access-2"
        ? { status: 200, body: { language: "en" } }
        : { status: 401, body: {} };
    });

    await session.request("get", "/main/settings/", { schema: settingsShape });
    expect(session.getCredential()).toEqual({ access: "access-2", refresh: "refresh-2" });
  });

  it("gives up after a second 401", async () => {
    const { session, requests } = sessionWith(({ url }) =>
      url === REFRESH_PATH
        ? { status: 200, body: { access: "access-2" } }
        : { status: 401, body: { detail: "Token expired" } },
    );

    const error = await session
      .request("get", "/main/settings/", { schema: settingsShape })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 401,
      message: "Request failed with status 401: Token expired",
    });
    expect(refreshCount(requests)).toBe(1);
    expect(requests).toHaveLength(3);
  });

  it("raises AuthError when the refresh is rejected", async () => {
    const { session } = sessionWith(({ url }) =>
      url === REFRESH_PATH
        ? { status: 401, body: { detail: "Token is invalid or expired" } }
        : { status: 401, body: {} },
    );

    const error = await session
      .request("get", "/main/settings/", { schema: settingsShape })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: "Token refresh failed: Token is invalid or expired" });
  });

  it("shares one refresh between concurrent requests", async () => {
    const { session, requests } = sessionWith(({ url, authorization }) => {
      if (url === REFRESH_PATH) return { status: 200, body: { access: "access-2" } };
      return authorization === "Bearer access-2"
        ? { status: 200, body: { language: url.includes("a") ? "a" : "b" } }
        : { status: 401, body: {} };
    });

    const results = await Promise.all([
      session.request("get", "/a/", { schema: settingsShape }),
      session.request("get", "/b/", { schema: settingsShape }),
      session.request("get", "/a/", { schema: settingsShape }),
    ]);

    expect(results).toEqual([{ language: "a" }, { language: "b" }, { language: "a" }]);
    expect(refreshCount(requests)).toBe(1);
  });

  it("reports malformed JSON as an ApiError", async () => {
    const { session } = sessionWith(() => ({ status: 200, raw: "<html>oops</html>" }));

    const error = await session
      .request("get", "/main/settings/", { schema: settingsShape })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ code: "malformed_json", status: 200 });
  });

  it("treats an empty body as an empty object", async () => {
    const { session } = sessionWith(() => ({ status: 204, raw: "" }));
    await expect(
      session.request("delete", "/main/settings/remove-user/", {
        schema: z.record(z.unknown()),
      }),
    ).resolves.toEqual({});
  });

  it("rejects a body that does not match the schema", async () => {
    const { session } = sessionWith(() => ({ status: 200, body: { language: 3 } }));

    const error = await session
      .request("get", "/main/settings/", { schema: settingsShape })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ code: "unexpected_response" });
  });

  it("maps a vendor error body onto ApiError", async () => {
    const { session } = sessionWith(() => ({
      status: 400,
      body: { code: "bad_request", detail: "Missing field" },
    }));

    const error = await session
      .request("post", "/main/location/update/", { body: {}, schema: settingsShape })
      .catch((e: unknown) => e);
    expect(error).toMatchObject({
      status: 400,
      code: "bad_request",
      detail: "Missing field",
      message: "Request failed with status 400: Missing field",
    });
  });

  it("wraps transport failures with status 0", async () => {
    const { session } = sessionWith(() => {
      throw new Error("socket hang up");
    });

    const error = await session
      .request("get", "/main/settings/", { schema: settingsShape })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 0,
      code: "network_error",
      message: "Request to /main/settings/ failed: socket hang up",
    });
  });
});

describe("Session.logout", () => {
  it("forgets the credential and the stored copy", async () => {
    const { session, manager } = sessionWith(() => ({ status: 200, body: {} }));
    await manager.set(PHONE, { access: "access-1", refresh: "refresh-1" });

    await session.logout();

    expect(session.isAuthenticated).toBe(false);
    expect(await manager.get(PHONE)).toBeNull();
  });

  it("restores a stored credential", async () => {
    const { session, manager } = sessionWith(() => ({ status: 200, body: {} }), false);
    await manager.set(PHONE, { access: "access-9", refresh: "refresh-9" });

    expect(await session.restore()).toBe(true);
    expect(session.getCredential()).toEqual({ access: "access-9", refresh: "refresh-9" });
  });
});
