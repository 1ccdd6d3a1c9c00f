import { describe, it, expect } from "vitest";
import { decodeFrame, encodeFrame, parseClientMessage } from "./protocol";

describe("parseClientMessage", () => {
  it("accepts each page topic", () => {
    expect(parseClientMessage('{"topic":"pointer/move","payload":{"x":1.5,"y":2}}')).toEqual({
      topic: "pointer/move",
      payload: { x: 1.5, y: 2 },
    });
    expect(parseClientMessage('{"topic":"pointer/exit"}')).toEqual({ topic: "pointer/exit" });
    expect(parseClientMessage('{"topic":"levels/set","payload":{"lo":1,"hi":2}}')).toEqual({
      topic: "levels/set",
      payload: { lo: 1, hi: 2 },
    });
    expect(parseClientMessage('{"topic":"levels/set","payload":{"lo":1,"hi":2,"channel":2}}')).toEqual({
      topic: "levels/set",
      payload: { lo: 1, hi: 2, channel: 2 },
    });
    expect(parseClientMessage('{"topic":"levels/reset"}')).toEqual({ topic: "levels/reset" });
    expect(parseClientMessage('{"topic":"isoline/set","payload":{"value":0.8}}')).toEqual({
      topic: "isoline/set",
      payload: { value: 0.8 },
    });
    expect(parseClientMessage('{"topic":"colormap/set","payload":{"name":"viridis"}}')).toEqual({
      topic: "colormap/set",
      payload: { name: "viridis" },
    });
  });

  it("rejects malformed messages", () => {
    expect(parseClientMessage("not json")).toBeNull();
    expect(parseClientMessage("[1,2]")).toBeNull();
    expect(parseClientMessage('{"topic":"pointer/move","payload":{"x":1}}')).toBeNull();
    expect(parseClientMessage('{"topic":"pointer/move","payload":{"x":"1","y":2}}')).toBeNull();
    expect(parseClientMessage('{"topic":"isoline/set"}')).toBeNull();
    expect(parseClientMessage('{"topic":"colormap/set","payload":{"name":3}}')).toBeNull();
    expect(parseClientMessage('{"topic":"shutdown"}')).toBeNull();
  });
});

describe("frames", () => {
  it("carry info and RGBA bytes", () => {
    const rgba = Uint8Array.from([1, 2, 3, 255, 4, 5, 6, 255]);
    const frame = decodeFrame(encodeFrame({ width: 2, height: 1, revision: 7 }, rgba));
    expect(frame?.topic).toBe("frame");
    expect(frame?.info).toEqual({ width: 2, height: 1, revision: 7 });
    expect(Array.from(frame?.data ?? [])).toEqual([1, 2, 3, 255, 4, 5, 6, 255]);
  });

  it("starts with a JSON envelope line", () => {
    const bytes = encodeFrame({ width: 1, height: 1, revision: 0 }, new Uint8Array(4));
    const newline = bytes.indexOf(10);
    expect(new TextDecoder().decode(bytes.subarray(0, newline))).toBe('{"topic":"frame"}');
  });

  it("rejects data that does not match the shape", () => {
    expect(decodeFrame(encodeFrame({ width: 3, height: 1, revision: 0 }, new Uint8Array(8)))).toBeNull();
  });

  it("rejects bytes without an envelope", () => {
    expect(decodeFrame(Uint8Array.from([1, 2, 3]))).toBeNull();
  });
});
