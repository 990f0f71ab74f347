import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@/core/error.core.js";
import { isNetworkOutput, parseNetTarget } from "@/services/sinks/net.sink.js";

describe("network outputs", () => {
  it("recognises udp and tcp urls", () => {
    expect(isNetworkOutput("udp://127.0.0.1:5000")).toBe(true);
    expect(isNetworkOutput("tcp://camera.local:9000")).toBe(true);
    expect(isNetworkOutput("/var/video.h264")).toBe(false);
  });

  it("parses host and port", () => {
    expect(parseNetTarget("udp://127.0.0.1:5000")).toEqual({ transport: "udp", host: "127.0.0.1", port: 5000 });
    expect(parseNetTarget("tcp://[::1]:9000")).toEqual({ transport: "tcp", host: "::1", port: 9000 });
  });

  it("rejects urls without a valid port", () => {
    expect(() => parseNetTarget("udp://127.0.0.1")).toThrow(ConfigurationError);
    expect(() => parseNetTarget("tcp://127.0.0.1:0")).toThrow(ConfigurationError);
  });
});
