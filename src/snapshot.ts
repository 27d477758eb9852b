/** Encodes tightly packed RGBA8 rows as a binary PPM (P6), dropping alpha. */
export function encodePpm(pixels: Uint8Array, width: number, height: number): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${width} ${height}\n255\n`);
  const body = new Uint8Array(width * height * 3);
  for (let p = 0, q = 0; p < width * height * 4; p += 4, q += 3) {
    body[q] = pixels[p];
    body[q + 1] = pixels[p + 1];
    body[q + 2] = pixels[p + 2];
  }

  const out = new Uint8Array(header.length + body.length);
  out.set(header);
  out.set(body, header.length);
  return out;
}
