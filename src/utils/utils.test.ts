import { describe, it, expect, vi, afterEach } from "vitest";
import { getGroundedError } from "./error-parser";
import { tryCatch, tryCatchSync } from "./try-catch";
import { assertionFailure } from "./diagnostics";
import { jsonCodec } from "./json-codec";
import { KeychainError } from "../keychain/errors";

describe("getGroundedError", () => {
  it("should put the keychain error code in front of the message", () => {
    expect(getGroundedError(new KeychainError("weak_passphrase", "too short"))).toBe(
      "[weak_passphrase] too short",
    );
  });

  it("should describe a keychain error without a message by its code", () => {
    expect(getGroundedError(new KeychainError("broken_data"))).toBe(
      "[broken_data] Keychain failed: broken data",
    );
  });

  it("should unpack causes", () => {
    const error = new Error("Failed to open", {
      cause: new KeychainError("broken_data", "bad tag"),
    });
    expect(getGroundedError(error)).toBe("Failed to open: [broken_data] bad tag");
  });

  it("should not repeat a cause carrying the same message", () => {
    const error = new Error("same", { cause: new Error("same") });
    expect(getGroundedError(error)).toBe("same");
  });

  it("should stringify values that are not errors", () => {
    expect(getGroundedError("plain")).toBe("plain");
    expect(getGroundedError(42)).toBe("42");
  });
});

describe("tryCatch", () => {
  it("should wrap the resolved value in a success", async () => {
    const result = await tryCatch(async () => 7);
    expect(result).toEqual({ success: true, data: 7, error: null });
  });

  it("should turn a rejection into a failure keeping the cause", async () => {
    const thrown = new KeychainError("unhandled", "boom");
    const result = await tryCatch(async () => {
      throw thrown;
    });

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe("[unhandled] boom");
    expect(result.error?.cause).toBe(thrown);
  });

  it("should use a custom error formatter", async () => {
    const result = await tryCatch(
      async () => {
        throw new Error("raw");
      },
      () => "formatted",
    );
    expect(result.error?.message).toBe("formatted");
  });
});

describe("tryCatchSync", () => {
  it("should return thrown errors as they are", () => {
    const thrown = new Error("sync");
    const result = tryCatchSync(() => {
      throw thrown;
    });
    expect(result.error).toBe(thrown);
  });

  it("should wrap thrown values that are not errors", () => {
    const result = tryCatchSync(() => {
      throw "text";
    });
    expect(result.error?.message).toBe("text");
  });
});

describe("assertionFailure", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("should warn with the scope as prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    assertionFailure("Scope", "went wrong");
    expect(warn).toHaveBeenCalledWith("[Scope] went wrong");
  });

  it("should stay silent in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    assertionFailure("Scope", "went wrong");
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("jsonCodec", () => {
  it("should keep binary values through encoding", () => {
    const codec = jsonCodec<{ bytes: Uint8Array }>();
    const decoded = codec.decode(codec.encode({ bytes: new Uint8Array([1, 2, 255]) }));
    expect(decoded.bytes).toBeInstanceOf(Uint8Array);
    expect(Array.from(decoded.bytes)).toEqual([1, 2, 255]);
  });

  it("should throw on malformed input", () => {
    expect(() => jsonCodec<number>().decode("{")).toThrow(SyntaxError);
  });
});
