/**
 * AVCDecoderConfigurationRecord (avcC, ISO/IEC 14496-15) helpers
 */

import { toUint8Array, type BufferSource } from '../utils/buffer.js';
import { dataError } from '../utils/errors.js';

/**
 * Size in bytes of the NAL length fields in samples described by an avcC record
 */
export function readNalLengthSize(description: BufferSource): 1 | 2 | 3 | 4 {
  const data = toUint8Array(description);
  if (data.length < 7 || data[0] !== 1) {
    throw dataError('Invalid AVCDecoderConfigurationRecord');
  }

  switch (data[4] & 0x03) {
    case 0:
      return 1;
    case 1:
      return 2;
    case 2:
      return 3;
    default:
      return 4;
  }
}
