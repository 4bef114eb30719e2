import { setTimeout as sleep } from 'node:timers/promises';
import type { DisplayState, LevelField, TubeColor, TubeState, TubeUpdate } from '../types';
import { padDigits } from './digits';
import type {
  DisplayFrameEvent,
  DisplayFrameListener,
  DisplayLogEvent,
  DisplayLogListener,
  DisplayMetrics,
  DisplayStateListener,
  DisplayTransport,
  DisposableLike,
  TransportFactory
} from './displayTypes';
import { getErrorMessage, InvalidArgumentError, OutOfRangeError, TransportError, TransportUnavailableError } from './errors';
import { SerialTransport } from './transport/serialTransport';
import { NixieTube } from './tube';
import { requireLevel } from './validation';

export const DEFAULT_SETTLE_MS = 100;
export const DEFAULT_BAUD_RATE = 115200;
export const FRAGMENT_PREFIX = '$';
export const FRAME_LATCH = '!';

export interface NixieDisplayOptions {
  tubeCount: number;
  /** Serial device path, e.g. `/dev/ttyUSB0` or `COM3`. */
  target?: string;
  brightness?: number;
  red?: number;
  green?: number;
  blue?: number;
  settleMs?: number;
  baudRate?: number;
  createTransport?: TransportFactory;
  delay?: (ms: number) => Promise<void>;
  logger?: (event: DisplayLogEvent) => void;
}

const levelSetters: Record<LevelField, (tube: NixieTube, value: number) => void> = {
  brightness: (tube, value) => tube.setBrightness(value),
  red: (tube, value) => tube.setRed(value),
  green: (tube, value) => tube.setGreen(value),
  blue: (tube, value) => tube.setBlue(value)
};

const defaultTransportFactory: TransportFactory = (target, options) => new SerialTransport(target, options);

/**
 * A chain of Smart Nixie Tubes behind one serial link.
 *
 * Tubes are held in installation order, left to right. Frames are sent with
 * the last tube's data first: each tube shifts what it receives on to its
 * right-hand neighbour, so the first fragment on the wire ends up in the
 * rightmost tube once the `!` latch arrives.
 */
export class NixieDisplay {
  private readonly tubes: NixieTube[];
  private readonly frameListeners = new Set<DisplayFrameListener>();
  private readonly stateListeners = new Set<DisplayStateListener>();
  private readonly logListeners = new Set<DisplayLogListener>();
  private readonly levels: Record<LevelField, number> = { brightness: 0, red: 0, green: 0, blue: 0 };
  private readonly settleMs: number;
  private readonly delay: (ms: number) => Promise<void>;
  private state: DisplayState = 'open';
  private sequence = 0;
  private framesSent = 0;
  private sendFailures = 0;
  private lastFrame: string | undefined;
  private lastSendAt: number | undefined;

  private constructor(
    private readonly transport: DisplayTransport,
    tubeCount: number,
    private readonly options: NixieDisplayOptions
  ) {
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.delay = options.delay ?? (ms => sleep(ms));
    this.tubes = Array.from({ length: tubeCount }, () => new NixieTube());
  }

  /**
   * Validates the options, opens the transport and returns a display whose
   * tubes are blank and carry the requested brightness and colour. The
   * frame is not sent until `send()` is called.
   */
  public static async open(options: NixieDisplayOptions): Promise<NixieDisplay> {
    const { tubeCount } = options;
    if (!Number.isInteger(tubeCount) || tubeCount < 1) {
      throw new InvalidArgumentError('Tube count must be greater than 0', { tubeCount });
    }
    const defaults = {
      brightness: requireLevel('brightness', options.brightness ?? 0),
      red: requireLevel('red', options.red ?? 0),
      green: requireLevel('green', options.green ?? 0),
      blue: requireLevel('blue', options.blue ?? 0)
    };
    const settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    if (!Number.isFinite(settleMs) || settleMs < 0) {
      throw new InvalidArgumentError('Settle interval must be a non-negative number of milliseconds', { settleMs });
    }

    const target = options.target?.trim();
    if (!target) {
      throw new TransportUnavailableError('No serial port specified');
    }

    const createTransport = options.createTransport ?? defaultTransportFactory;
    let display: NixieDisplay | undefined;
    const transport = createTransport(target, {
      baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
      onError: error => {
        const event: DisplayLogEvent = {
          level: 'warn',
          scope: 'transport',
          message: `Serial port ${target} reported an error: ${error.message}`
        };
        if (display) {
          display.emitLog(event);
        } else {
          options.logger?.(event);
        }
      }
    });
    try {
      await transport.open();
    } catch (error) {
      throw new TransportUnavailableError(`Error opening serial port ${target}`, { target }, error);
    }

    const opened = new NixieDisplay(transport, tubeCount, options);
    display = opened;
    opened.setBrightness(defaults.brightness);
    opened.setColor(defaults);
    opened.emitLog({
      level: 'info',
      scope: 'display',
      message: `Opened ${tubeCount} tube display on ${target}`,
      details: { settleMs }
    });
    return opened;
  }

  public get tubeCount(): number {
    return this.tubes.length;
  }

  public get target(): string {
    return this.transport.target;
  }

  public get brightness(): number {
    return this.levels.brightness;
  }

  public get red(): number {
    return this.levels.red;
  }

  public get green(): number {
    return this.levels.green;
  }

  public get blue(): number {
    return this.levels.blue;
  }

  public getState(): DisplayState {
    return this.state;
  }

  public isOpen(): boolean {
    return this.state === 'open';
  }

  public setBrightness(value: number): void {
    this.setLevel('brightness', value);
  }

  public setRed(value: number): void {
    this.setLevel('red', value);
  }

  public setGreen(value: number): void {
    this.setLevel('green', value);
  }

  public setBlue(value: number): void {
    this.setLevel('blue', value);
  }

  /** Sets all three channels on every tube; nothing is stored if any channel is rejected. */
  public setColor(color: TubeColor): void {
    this.assertOpen();
    const red = requireLevel('red', color.red);
    const green = requireLevel('green', color.green);
    const blue = requireLevel('blue', color.blue);
    this.setLevel('red', red);
    this.setLevel('green', green);
    this.setLevel('blue', blue);
  }

  public setTube(index: number, update: TubeUpdate): void {
    this.assertOpen();
    this.tubeAt(index).apply(update);
  }

  public getTube(index: number): TubeState {
    return this.tubeAt(index).snapshot();
  }

  public getTubes(): TubeState[] {
    return this.tubes.map(tube => tube.snapshot());
  }

  /**
   * Blanks every digit and zeroes brightness and colour. Decimal points and
   * the display-level values are left as they are; `blank()` clears
   * everything.
   */
  public reset(): void {
    this.assertOpen();
    this.tubes.forEach(tube => {
      tube.apply({ digit: '-', brightness: 0, red: 0, green: 0, blue: 0 });
    });
  }

  /** Turns every tube fully off, decimal points included. */
  public blank(): void {
    this.assertOpen();
    this.tubes.forEach(tube => tube.turnOff());
  }

  /** The first tube receives the most significant digit. */
  public setDisplayNumber(value: number): void {
    this.assertOpen();
    const digits = padDigits(value, this.tubes.length);
    this.tubes.forEach((tube, index) => tube.setDigit(digits.charAt(index)));
  }

  public buildFrame(): string {
    let frame = '';
    for (const tube of this.tubes) {
      frame = FRAGMENT_PREFIX + tube.encodeFragment() + frame;
    }
    return frame + FRAME_LATCH;
  }

  public encodeFrame(): Buffer {
    return Buffer.from(this.buildFrame(), 'ascii');
  }

  /**
   * Flushes the link, writes the current frame and waits for the settle
   * interval so the tubes can latch it. Failures are not retried and leave
   * the in-memory state as it was.
   */
  public async send(): Promise<void> {
    this.assertOpen();
    if (!this.transport.isOpen()) {
      throw new TransportUnavailableError(`Serial port ${this.transport.target} is not open`, {
        target: this.transport.target
      });
    }

    const frame = this.buildFrame();
    try {
      await this.runTransport('flush', () => this.transport.flush());
      await this.runTransport('write', () => this.transport.write(Buffer.from(frame, 'ascii')));
    } catch (error) {
      this.sendFailures += 1;
      this.emitLog({ level: 'error', scope: 'transport', message: getErrorMessage(error) });
      throw error;
    }
    await this.delay(this.settleMs);

    this.framesSent += 1;
    this.lastFrame = frame;
    this.lastSendAt = Date.now();
    const event: DisplayFrameEvent = { sequence: ++this.sequence, timestamp: this.lastSendAt, frame };
    this.frameListeners.forEach(listener => listener(event));
    this.emitLog({ level: 'debug', scope: 'display', message: 'Frame sent.', details: { sequence: event.sequence, frame } });
  }

  /**
   * Resets the tubes, sends the cleared frame and releases the transport.
   * Never throws; failures are logged. Calling it again has no effect.
   */
  public async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }

    try {
      this.reset();
      await this.send();
    } catch (error) {
      this.emitLog({
        level: 'warn',
        scope: 'display',
        message: `Failed to clear display during close: ${getErrorMessage(error)}`
      });
    }

    try {
      await this.transport.close();
    } catch (error) {
      this.emitLog({
        level: 'warn',
        scope: 'transport',
        message: `Failed to close serial port ${this.transport.target}: ${getErrorMessage(error)}`
      });
    }

    this.state = 'closed';
    this.stateListeners.forEach(listener => listener(this.state));
    this.emitLog({ level: 'info', scope: 'display', message: 'Display closed.' });
  }

  public getMetrics(): DisplayMetrics {
    return {
      state: this.state,
      tubeCount: this.tubes.length,
      settleMs: this.settleMs,
      sequence: this.sequence,
      framesSent: this.framesSent,
      sendFailures: this.sendFailures,
      lastFrame: this.lastFrame,
      lastSendAt: this.lastSendAt
    };
  }

  public onFrame(listener: DisplayFrameListener): DisposableLike {
    this.frameListeners.add(listener);
    return {
      dispose: () => this.frameListeners.delete(listener)
    };
  }

  public onStateChange(listener: DisplayStateListener): DisposableLike {
    this.stateListeners.add(listener);
    return {
      dispose: () => this.stateListeners.delete(listener)
    };
  }

  public onLog(listener: DisplayLogListener): DisposableLike {
    this.logListeners.add(listener);
    return {
      dispose: () => this.logListeners.delete(listener)
    };
  }

  private setLevel(field: LevelField, value: number): void {
    this.assertOpen();
    const level = requireLevel(field, value);
    this.levels[field] = level;
    const apply = levelSetters[field];
    this.tubes.forEach(tube => apply(tube, level));
  }

  private tubeAt(index: number): NixieTube {
    if (!Number.isInteger(index)) {
      throw new InvalidArgumentError('Tube index must be an integer', { index });
    }
    const tube = this.tubes[index];
    if (!tube) {
      throw new OutOfRangeError('tubeIndex', `Tube index must be between 0-${this.tubes.length - 1}`, { index });
    }
    return tube;
  }

  private assertOpen(): void {
    if (this.state === 'closed') {
      throw new TransportUnavailableError('Display has been closed', { target: this.transport.target });
    }
  }

  private async runTransport(operation: 'flush' | 'write', action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      throw TransportError.wrap(operation, error, this.transport.target);
    }
  }

  private emitLog(event: DisplayLogEvent): void {
    this.options.logger?.(event);
    this.logListeners.forEach(listener => listener(event));
  }
}

/**
 * Opens a display, hands it to `fn` and closes it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withDisplay<T>(
  options: NixieDisplayOptions,
  fn: (display: NixieDisplay) => Promise<T> | T
): Promise<T> {
  const display = await NixieDisplay.open(options);
  try {
    return await fn(display);
  } finally {
    await display.close();
  }
}
