import { describe, expect, it } from "vitest";
import { ScryptPasswordHasher } from "../../src/infra/auth";

describe("ScryptPasswordHasher", () => {
  const hasher = new ScryptPasswordHasher(1024);

  it("stores the cost, salt and key", async () => {
    const stored = await hasher.hash("test-password");
    const [prefix, cost, salt, key] = stored.split("$");

    expect(prefix).toBe("scrypt");
    expect(cost).toBe("1024");
    expect(Buffer.from(salt ?? "", "base64")).toHaveLength(16);
    expect(Buffer.from(key ?? "", "base64")).toHaveLength(64);
  });

  it("verifies the right password only", async () => {
    const stored = await hasher.hash("test-password");

    expect(await hasher.verify("test-password", stored)).toBe(true);
    expect(await hasher.verify("wrong-password", stored)).toBe(false);
  });

  it("salts every hash", async () => {
    const first = await hasher.hash("test-password");
    const second = await hasher.hash("test-password");

    expect(first).not.toBe(second);
  });

  it("rejects stored values it did not produce", async () => {
    expect(await hasher.verify("test-password", "plain-text")).toBe(false);
    expect(await hasher.verify("test-password", "bcrypt$10$abc$def")).toBe(false);
  });
});
