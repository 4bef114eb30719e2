export { NixieDisplay, withDisplay, DEFAULT_BAUD_RATE, DEFAULT_SETTLE_MS, type NixieDisplayOptions } from './display/displayCore';
export { NixieTube, BLANK_TUBE } from './display/tube';
export { toDigitString, padDigits } from './display/digits';
export {
  NixieDisplayError,
  InvalidArgumentError,
  OutOfRangeError,
  TransportUnavailableError,
  TransportError,
  isNixieDisplayError,
  type NixieDisplayErrorCode
} from './display/errors';
export { SerialTransport, type SerialPortHandle, type SerialTransportOptions } from './display/transport/serialTransport';
export { MemoryTransport } from './display/transport/memoryTransport';
export { DisplayApplicationService } from './display/displayApplicationService';
export { loadDisplayConfig, toDisplayOptions, type DisplayConfig } from './display/config';
export type {
  DisplayTransport,
  TransportFactory,
  TransportOptions,
  DisplayFrameEvent,
  DisplayLogEvent,
  DisplayMetrics,
  DisposableLike
} from './display/displayTypes';
export type { TubeDigit, TubeState, TubeUpdate, TubeColor, DisplayState } from './types';
