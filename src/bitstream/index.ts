/**
 * Bitstream-level helpers: framing, NAL scanning and emulation prevention
 */

export {
  START_CODE,
  LENGTH_PREFIX_SIZE,
  detectFraming,
  findStartCode,
  frameNalUnit,
  readUint32BE,
} from './framing.js';

export {
  H264NalType,
  NalUnitScanner,
  collectNalUnits,
  isVclNalType,
  scanNalUnits,
  type NalUnit,
} from './nal-scanner.js';

export {
  addEmulationPrevention,
  removeEmulationPrevention,
} from './emulation-prevention.js';
