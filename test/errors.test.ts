import { describe, expect, it } from "vitest";
import {
  ConfigError,
  isTrackioError,
  NoEndpointError,
  NotFoundError,
  StatusError,
  TrackioError,
  TransportError,
} from "../src/core/errors.js";

describe("Errors", () => {
  it("should tag every error with its code and class name", () => {
    const cases: [TrackioError, string, string][] = [
      [new TransportError("/p", new Error("x")), "TRANSPORT", "TransportError"],
      [new NotFoundError("/p", ""), "NOT_FOUND", "NotFoundError"],
      [new StatusError("/p", 500, ""), "STATUS", "StatusError"],
      [new NoEndpointError([]), "NO_ENDPOINT", "NoEndpointError"],
      [new ConfigError("bad"), "CONFIG", "ConfigError"],
    ];

    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(TrackioError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it("should describe transport failures that are not Errors", () => {
    const err = new TransportError("/api/bulk_log", "socket hang up");
    expect(err.message).toBe("POST /api/bulk_log failed: socket hang up");
    expect(err.cause).toBe("socket hang up");
  });

  it("should include the path when serializing transport failures", () => {
    const err = new TransportError("/api/bulk_log", new Error("ECONNREFUSED"));
    expect(err.toJSON()).toEqual({
      type: "TransportError",
      code: "TRANSPORT",
      message: "POST /api/bulk_log failed: ECONNREFUSED",
      path: "/api/bulk_log",
    });
  });

  it("should list the tried paths in NoEndpointError", () => {
    const err = new NoEndpointError([
      new NotFoundError("/api/bulk_log", ""),
      new NotFoundError("/gradio_api/bulk_log", ""),
    ]);

    expect(err.message).toBe(
      "no bulk-log endpoint available (tried /api/bulk_log, /gradio_api/bulk_log)",
    );
    expect(err.toJSON()).toEqual({
      type: "NoEndpointError",
      code: "NO_ENDPOINT",
      message: err.message,
      attempts: ["/api/bulk_log", "/gradio_api/bulk_log"],
    });
  });

  it("should serialize status errors with code and body", () => {
    expect(new StatusError("/api/bulk_log", 500, "boom").toJSON()).toEqual({
      type: "StatusError",
      code: "STATUS",
      message: "POST /api/bulk_log -> 500; body: boom",
      path: "/api/bulk_log",
      status: 500,
      body: "boom",
    });
  });

  it("should narrow with isTrackioError", () => {
    expect(isTrackioError(new StatusError("/p", 500, ""))).toBe(true);
    expect(isTrackioError(new Error("plain"))).toBe(false);
    expect(isTrackioError("nope")).toBe(false);
  });
});
