import { describe, it, expect } from "vitest";
import {
  CacheError,
  DecodeError,
  ProviderError,
  StoreError,
  getFailureMessage,
  isRetryable,
  toFailureReason,
  errorMessage,
} from "./cache-errors";

describe("Cache Errors", () => {
  describe("getFailureMessage", () => {
    it("should return a user-facing message for NOT_FOUND", () => {
      const msg = getFailureMessage("NOT_FOUND");
      expect(msg.userMessage).toBe("No lyrics were found for this song.");
      expect(msg.retryable).toBe(false);
    });

    it("should mark provider failures as retryable", () => {
      const msg = getFailureMessage("PROVIDER_ERROR");
      expect(msg.retryable).toBe(true);
      expect(msg.suggestedAction).toBe("Try again in a few minutes");
    });

    it("should return default message for unknown reason", () => {
      const msg = getFailureMessage("SOMETHING_ELSE");
      expect(msg.userMessage).toBe("An unexpected error occurred. Please try again.");
      expect(msg.retryable).toBe(true);
    });

    it("should not treat prototype keys as reasons", () => {
      expect(getFailureMessage("toString").userMessage).toBe(
        "An unexpected error occurred. Please try again."
      );
    });
  });

  describe("isRetryable", () => {
    it("should follow the message table", () => {
      expect(isRetryable("INVALID_KEY")).toBe(false);
      expect(isRetryable("STORE_ERROR")).toBe(true);
    });
  });

  describe("toFailureReason", () => {
    it("should read the reason from cache errors", () => {
      expect(toFailureReason(new DecodeError("bad"))).toBe("DECODE_ERROR");
      expect(toFailureReason(new StoreError("locked"))).toBe("STORE_ERROR");
      expect(toFailureReason(new ProviderError("timeout"))).toBe("PROVIDER_ERROR");
    });

    it("should classify foreign errors as UNKNOWN_ERROR", () => {
      expect(toFailureReason(new Error("boom"))).toBe("UNKNOWN_ERROR");
      expect(toFailureReason("boom")).toBe("UNKNOWN_ERROR");
    });
  });

  it("should keep the cause on wrapped errors", () => {
    const cause = new Error("socket hang up");
    const error = new ProviderError("lookup failed", { cause });
    expect(error).toBeInstanceOf(CacheError);
    expect(error.cause).toBe(cause);
    expect(error.name).toBe("ProviderError");
  });

  it("should stringify non-error values", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });
});
