/**
 * RBSP emulation prevention (H.264 section 7.4.1)
 *
 * Inside a NAL unit the byte pattern 00 00 0x (x <= 3) must never appear, or a
 * parser would mistake it for a start code. Encoders break it up with 0x03.
 */

const EMULATION_PREVENTION_BYTE = 0x03;

/**
 * Insert emulation prevention bytes into an RBSP
 */
export function addEmulationPrevention(rbsp: Uint8Array): Uint8Array {
  // Worst case: one escape byte for every two input bytes
  const out = new Uint8Array(rbsp.length + Math.ceil(rbsp.length / 2));
  let length = 0;
  let zeros = 0;

  for (let i = 0; i < rbsp.length; i++) {
    const byte = rbsp[i];
    if (zeros >= 2 && byte <= 0x03) {
      out[length++] = EMULATION_PREVENTION_BYTE;
      zeros = 0;
    }
    out[length++] = byte;
    zeros = byte === 0x00 ? zeros + 1 : 0;
  }

  return out.slice(0, length);
}

/**
 * Strip emulation prevention bytes, recovering the RBSP
 *
 * The byte after a removed 0x03 is always data, even when it is 0x00-0x03.
 */
export function removeEmulationPrevention(data: Uint8Array): Uint8Array {
  const out = new Uint8Array(data.length);
  let length = 0;
  let zeros = 0;

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (zeros >= 2 && byte === EMULATION_PREVENTION_BYTE) {
      zeros = 0;
      continue;
    }
    out[length++] = byte;
    zeros = byte === 0x00 ? zeros + 1 : 0;
  }

  return out.slice(0, length);
}
