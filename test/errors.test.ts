import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  ClassifierUnavailableError,
  DetectionError,
  EntityNotFoundError,
  PrivacyLedgerError,
  StorageError,
  VersionNotFoundError,
  withStorage,
} from "../src/errors.js";

describe("VersionNotFoundError", () => {
  it("should carry name, code and message", () => {
    const error = new VersionNotFoundError("session-1", 7);
    assert.equal(error.name, "VersionNotFoundError");
    assert.equal(error.code, "VERSION_NOT_FOUND");
    assert.equal(error.message, "Version 7 not found for document session-1");
  });

  it("should extend PrivacyLedgerError", () => {
    const error = new VersionNotFoundError("session-1", 7);
    assert.ok(error instanceof PrivacyLedgerError);
    assert.ok(error instanceof Error);
  });
});

describe("StorageError", () => {
  it("should describe the operation and keep the cause", () => {
    const cause = new Error("disk I/O error");
    const error = new StorageError("version save", cause);
    assert.equal(error.code, "STORAGE_ERROR");
    assert.equal(error.message, "Storage failure during version save: disk I/O error");
    assert.equal(error.cause, cause);
  });
});

describe("DetectionError and ClassifierUnavailableError", () => {
  it("should format pattern failures", () => {
    const error = new DetectionError("Broken", new SyntaxError("Unterminated group"));
    assert.equal(error.code, "DETECTION_ERROR");
    assert.equal(error.message, "Pattern 'Broken' could not be compiled: Unterminated group");
  });

  it("should format classifier failures", () => {
    const error = new ClassifierUnavailableError("timed out after 50ms");
    assert.equal(error.code, "CLASSIFIER_UNAVAILABLE");
    assert.equal(error.message, "External classifier unavailable: timed out after 50ms");
  });
});

describe("withStorage", () => {
  it("should return the step's value", () => {
    assert.equal(withStorage("noop", () => 42), 42);
  });

  it("should wrap driver errors in StorageError", () => {
    assert.throws(
      () =>
        withStorage("card insert", () => {
          throw new Error("SQLITE_FULL");
        }),
      (err: unknown) => err instanceof StorageError && err.message === "Storage failure during card insert: SQLITE_FULL",
    );
  });

  it("should pass domain errors through unchanged", () => {
    assert.throws(
      () =>
        withStorage("lookup", () => {
          throw new EntityNotFoundError("Card", "card-1");
        }),
      EntityNotFoundError,
    );
  });
});
