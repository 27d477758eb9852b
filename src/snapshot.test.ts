import { describe, it, expect } from "vitest";
import { encodePpm } from "./snapshot.js";

describe("encodePpm", () => {
  it("writes a P6 header followed by RGB triples", () => {
    const pixels = new Uint8Array([10, 20, 30, 255, 40, 50, 60, 128]);
    const encoded = encodePpm(pixels, 1, 2);

    const header = "P6\n1 2\n255\n";
    expect(new TextDecoder().decode(encoded.subarray(0, header.length))).toBe(header);
    expect(Array.from(encoded.subarray(header.length))).toEqual([10, 20, 30, 40, 50, 60]);
  });
});
