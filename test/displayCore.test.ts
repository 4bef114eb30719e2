import { afterEach, describe, expect, it, vi } from 'vitest';
import { NixieDisplay, withDisplay, type NixieDisplayOptions } from '../src/display/displayCore';
import type { DisplayLogEvent } from '../src/display/displayTypes';
import {
  InvalidArgumentError,
  OutOfRangeError,
  TransportError,
  TransportUnavailableError
} from '../src/display/errors';
import { MemoryTransport } from '../src/display/transport/memoryTransport';

const BLANK = '-,N,N,000,000,000,000';

interface Fixture {
  display: NixieDisplay;
  transport: MemoryTransport;
  delays: number[];
  logs: DisplayLogEvent[];
}

const openDisplays: NixieDisplay[] = [];

afterEach(async () => {
  await Promise.all(openDisplays.splice(0).map(display => display.close()));
});

async function openFixture(options: Partial<NixieDisplayOptions> = {}): Promise<Fixture> {
  const transport = new MemoryTransport('/dev/ttyTEST');
  const delays: number[] = [];
  const logs: DisplayLogEvent[] = [];
  const display = await NixieDisplay.open({
    tubeCount: 3,
    target: '/dev/ttyTEST',
    createTransport: () => transport,
    delay: async ms => {
      delays.push(ms);
    },
    logger: event => logs.push(event),
    ...options
  });
  openDisplays.push(display);
  return { display, transport, delays, logs };
}

describe('NixieDisplay.open', () => {
  it('rejects a tube count below one', async () => {
    const createTransport = vi.fn(() => new MemoryTransport());
    await expect(NixieDisplay.open({ tubeCount: 0, target: '/dev/ttyTEST', createTransport })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    await expect(NixieDisplay.open({ tubeCount: -2, target: '/dev/ttyTEST', createTransport })).rejects.toThrow(
      'Tube count must be greater than 0'
    );
    expect(createTransport).not.toHaveBeenCalled();
  });

  it('requires a transport target', async () => {
    await expect(NixieDisplay.open({ tubeCount: 2 })).rejects.toBeInstanceOf(TransportUnavailableError);
    await expect(NixieDisplay.open({ tubeCount: 2, target: '  ' })).rejects.toThrow('No serial port specified');
  });

  it('reports a transport that cannot be opened', async () => {
    const transport = new MemoryTransport('/dev/missing');
    const cause = new Error('No such file or directory');
    transport.failOn('open', cause);

    const failure = NixieDisplay.open({ tubeCount: 2, target: '/dev/missing', createTransport: () => transport });
    await expect(failure).rejects.toBeInstanceOf(TransportUnavailableError);
    await expect(failure).rejects.toThrow('Error opening serial port /dev/missing');
    await expect(failure).rejects.toHaveProperty('cause', cause);
  });

  it('validates default levels before opening the transport', async () => {
    const createTransport = vi.fn(() => new MemoryTransport());
    await expect(
      NixieDisplay.open({ tubeCount: 2, target: '/dev/ttyTEST', brightness: 256, createTransport })
    ).rejects.toBeInstanceOf(OutOfRangeError);
    expect(createTransport).not.toHaveBeenCalled();
  });

  it('passes the baud rate to the transport factory', async () => {
    const createTransport = vi.fn((target: string) => new MemoryTransport(target));
    const display = await NixieDisplay.open({ tubeCount: 1, target: '/dev/ttyTEST', createTransport });
    openDisplays.push(display);
    expect(createTransport).toHaveBeenCalledWith('/dev/ttyTEST', expect.objectContaining({ baudRate: 115200 }));
  });

  it('starts with blank tubes carrying the default brightness and colour', async () => {
    const { display, transport } = await openFixture({ brightness: 128, red: 0, green: 0, blue: 255 });
    expect(display.getTubes().map(tube => tube.digit)).toEqual(['-', '-', '-']);
    expect(display.buildFrame()).toBe('$-,N,N,128,000,000,255$-,N,N,128,000,000,255$-,N,N,128,000,000,255!');
    expect(display.brightness).toBe(128);
    expect(display.blue).toBe(255);
    expect(transport.getWrites()).toEqual([]);
  });
});

describe('NixieDisplay state', () => {
  it('fans bulk levels out to every tube', async () => {
    const { display } = await openFixture();
    display.setBrightness(200);
    display.setRed(10);
    display.setGreen(20);
    display.setBlue(30);

    display.getTubes().forEach(tube => {
      expect(tube.brightness).toBe(200);
      expect(tube.red).toBe(10);
      expect(tube.green).toBe(20);
      expect(tube.blue).toBe(30);
    });
    expect([display.brightness, display.red, display.green, display.blue]).toEqual([200, 10, 20, 30]);
  });

  it('overwrites per-tube levels with the bulk value', async () => {
    const { display } = await openFixture();
    display.setTube(1, { red: 99, brightness: 5 });
    display.setRed(7);
    expect(display.getTubes().map(tube => tube.red)).toEqual([7, 7, 7]);
    expect(display.getTube(1).brightness).toBe(5);
  });

  it('rejects bulk levels out of range without touching the tubes', async () => {
    const { display } = await openFixture({ brightness: 50 });
    expect(() => display.setBrightness(256)).toThrow(OutOfRangeError);
    expect(() => display.setGreen(-1)).toThrow('Green must be between 0-255');
    expect(display.brightness).toBe(50);
    expect(display.getTubes().map(tube => tube.brightness)).toEqual([50, 50, 50]);
  });

  it('applies a colour only when all channels are valid', async () => {
    const { display } = await openFixture();
    expect(() => display.setColor({ red: 1, green: 2, blue: 300 })).toThrow(OutOfRangeError);
    expect(display.getTube(0)).toMatchObject({ red: 0, green: 0, blue: 0 });

    display.setColor({ red: 1, green: 2, blue: 3 });
    expect(display.getTube(2)).toMatchObject({ red: 1, green: 2, blue: 3 });
  });

  it('checks tube indexes', async () => {
    const { display } = await openFixture();
    expect(() => display.setTube(3, { digit: '1' })).toThrow(OutOfRangeError);
    expect(() => display.setTube(-1, { digit: '1' })).toThrow(OutOfRangeError);
    expect(() => display.getTube(1.5)).toThrow(InvalidArgumentError);
  });

  it('resets digits and levels but keeps decimal points', async () => {
    const { display } = await openFixture({ brightness: 90, red: 1, green: 2, blue: 3 });
    display.setDisplayNumber(123);
    display.setTube(0, { leftDecimalPoint: true });
    display.setTube(2, { rightDecimalPoint: true });

    display.reset();

    expect(display.getTubes()).toEqual([
      { digit: '-', leftDecimalPoint: true, rightDecimalPoint: false, brightness: 0, red: 0, green: 0, blue: 0 },
      { digit: '-', leftDecimalPoint: false, rightDecimalPoint: false, brightness: 0, red: 0, green: 0, blue: 0 },
      { digit: '-', leftDecimalPoint: false, rightDecimalPoint: true, brightness: 0, red: 0, green: 0, blue: 0 }
    ]);
    expect(display.brightness).toBe(90);
  });

  it('blanks every tube including decimal points', async () => {
    const { display } = await openFixture({ brightness: 90 });
    display.setTube(0, { digit: '4', leftDecimalPoint: true, rightDecimalPoint: true });
    display.blank();
    expect(display.buildFrame()).toBe(`$${BLANK}$${BLANK}$${BLANK}!`);
  });
});

describe('NixieDisplay.setDisplayNumber', () => {
  it('shows zero on every tube', async () => {
    const { display } = await openFixture();
    display.setDisplayNumber(0);
    expect(display.getTubes().map(tube => tube.digit)).toEqual(['0', '0', '0']);
  });

  it('left-pads and puts the most significant digit on the first tube', async () => {
    const { display } = await openFixture();
    display.setDisplayNumber(42);
    expect(display.getTubes().map(tube => tube.digit)).toEqual(['0', '4', '2']);
  });

  it('fills every tube when the digit count matches', async () => {
    const { display } = await openFixture();
    display.setDisplayNumber(999);
    expect(display.getTubes().map(tube => tube.digit)).toEqual(['9', '9', '9']);
  });

  it('fails when the number has more digits than tubes', async () => {
    const { display } = await openFixture();
    display.setDisplayNumber(7);
    expect(() => display.setDisplayNumber(1000)).toThrow(OutOfRangeError);
    expect(() => display.setDisplayNumber(1000)).toThrow('Not enough tubes to display all digits');
    expect(display.getTubes().map(tube => tube.digit)).toEqual(['0', '0', '7']);
  });

  it('rejects negative and fractional numbers', async () => {
    const { display } = await openFixture();
    expect(() => display.setDisplayNumber(-1)).toThrow(InvalidArgumentError);
    expect(() => display.setDisplayNumber(-1)).toThrow('Display number must be positive');
    expect(() => display.setDisplayNumber(1.5)).toThrow(InvalidArgumentError);
  });
});

describe('NixieDisplay frames', () => {
  it('sends the last tube first and latches with "!"', async () => {
    const { display } = await openFixture({ tubeCount: 2 });
    display.setTube(0, { digit: '5', brightness: 128, red: 0, green: 0, blue: 255 });
    expect(display.buildFrame()).toBe('$-,N,N,000,000,000,000$5,N,N,128,000,000,255!');
  });

  it('orders three tubes as tube 2, tube 1, tube 0', async () => {
    const { display } = await openFixture();
    display.setTube(0, { digit: '1', leftDecimalPoint: true });
    display.setTube(1, { digit: '2', brightness: 10 });
    display.setTube(2, { digit: '3', rightDecimalPoint: true, green: 7 });

    expect(display.buildFrame()).toBe('$3,N,Y,000,000,007,000$2,N,N,010,000,000,000$1,Y,N,000,000,000,000!');
  });

  it('encodes the frame as ASCII bytes and is stable between calls', async () => {
    const { display } = await openFixture({ brightness: 12 });
    display.setDisplayNumber(305);
    const first = display.encodeFrame();
    const second = display.encodeFrame();
    expect(first.equals(second)).toBe(true);
    expect(first.toString('ascii')).toBe(display.buildFrame());
    expect(first[0]).toBe(0x24);
    expect(first[first.length - 1]).toBe(0x21);
  });
});

describe('NixieDisplay.send', () => {
  it('flushes, writes the frame and waits for the settle interval', async () => {
    const { display, transport, delays } = await openFixture({ tubeCount: 2, settleMs: 25 });
    display.setDisplayNumber(7);
    await display.send();

    expect(transport.getOperations()).toEqual(['open', 'flush', 'write']);
    expect(transport.getLastWrite()).toBe('$7,N,N,000,000,000,000$0,N,N,000,000,000,000!');
    expect(delays).toEqual([25]);
  });

  it('uses a 100 ms settle interval by default', async () => {
    const { display, delays } = await openFixture();
    await display.send();
    expect(delays).toEqual([100]);
  });

  it('reports each frame to listeners and metrics', async () => {
    const { display } = await openFixture({ tubeCount: 1 });
    const frames: string[] = [];
    const subscription = display.onFrame(event => frames.push(`${event.sequence}:${event.frame}`));

    await display.send();
    display.setTube(0, { digit: '8' });
    await display.send();
    subscription.dispose();
    await display.send();

    expect(frames).toEqual(['1:$-,N,N,000,000,000,000!', '2:$8,N,N,000,000,000,000!']);
    expect(display.getMetrics()).toMatchObject({
      state: 'open',
      framesSent: 3,
      sendFailures: 0,
      sequence: 3,
      lastFrame: '$8,N,N,000,000,000,000!'
    });
  });

  it('wraps write failures and keeps the in-memory state', async () => {
    const { display, transport, delays } = await openFixture({ tubeCount: 1 });
    const cause = new Error('device disconnected');
    transport.failOn('write', cause);
    display.setTube(0, { digit: '6' });

    const failure = display.send();
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow('Transport write failed: device disconnected');
    await expect(failure).rejects.toHaveProperty('cause', cause);

    expect(display.getTube(0).digit).toBe('6');
    expect(delays).toEqual([]);
    expect(display.getMetrics().sendFailures).toBe(1);

    transport.clearFailures();
    await display.send();
    expect(transport.getLastWrite()).toBe('$6,N,N,000,000,000,000!');
  });

  it('wraps flush failures without writing', async () => {
    const { display, transport } = await openFixture();
    transport.failOn('flush');
    await expect(display.send()).rejects.toThrow('Transport flush failed: flush failed');
    expect(transport.getWrites()).toEqual([]);
  });

  it('refuses to send when the transport has gone away', async () => {
    const { display, transport } = await openFixture();
    await transport.close();
    await expect(display.send()).rejects.toBeInstanceOf(TransportUnavailableError);
    expect(transport.getWrites()).toEqual([]);
  });
});

describe('NixieDisplay.close', () => {
  it('resets, sends the cleared frame and releases the transport', async () => {
    const { display, transport } = await openFixture({ tubeCount: 2, brightness: 80 });
    display.setDisplayNumber(12);
    display.setTube(1, { rightDecimalPoint: true });
    const states: string[] = [];
    display.onStateChange(state => states.push(state));

    await display.close();

    expect(transport.getOperations()).toEqual(['open', 'flush', 'write', 'close']);
    expect(transport.getLastWrite()).toBe('$-,N,Y,000,000,000,000$-,N,N,000,000,000,000!');
    expect(transport.isOpen()).toBe(false);
    expect(display.getState()).toBe('closed');
    expect(states).toEqual(['closed']);
  });

  it('swallows failures and still closes the transport', async () => {
    const { display, transport, logs } = await openFixture();
    transport.failOn('write');

    await expect(display.close()).resolves.toBeUndefined();

    expect(transport.isOpen()).toBe(false);
    expect(display.getState()).toBe('closed');
    expect(logs.some(event => event.level === 'warn' && event.message.includes('Transport write failed'))).toBe(true);
  });

  it('ignores a failing transport close', async () => {
    const { display, transport, logs } = await openFixture();
    transport.failOn('close', new Error('busy'));

    await expect(display.close()).resolves.toBeUndefined();

    expect(display.getState()).toBe('closed');
    expect(logs.filter(event => event.level === 'warn').map(event => event.message)).toEqual([
      'Failed to close serial port /dev/ttyTEST: busy'
    ]);
  });

  it('only tears down once', async () => {
    const { display, transport } = await openFixture();
    await display.close();
    await display.close();
    expect(transport.getOperations().filter(operation => operation === 'close')).toHaveLength(1);
  });

  it('rejects mutators and sends after closing', async () => {
    const { display, transport } = await openFixture();
    await display.close();
    const writes = transport.getWrites().length;

    expect(() => display.setBrightness(10)).toThrow(TransportUnavailableError);
    expect(() => display.setColor({ red: 1, green: 1, blue: 1 })).toThrow(TransportUnavailableError);
    expect(() => display.setDisplayNumber(1)).toThrow(TransportUnavailableError);
    expect(() => display.setTube(0, { digit: '1' })).toThrow(TransportUnavailableError);
    expect(() => display.reset()).toThrow(TransportUnavailableError);
    expect(() => display.blank()).toThrow('Display has been closed');
    await expect(display.send()).rejects.toBeInstanceOf(TransportUnavailableError);
    expect(transport.getWrites()).toHaveLength(writes);
  });
});

describe('withDisplay', () => {
  it('closes the display after the callback resolves', async () => {
    const transport = new MemoryTransport('/dev/ttyTEST');
    const result = await withDisplay(
      { tubeCount: 1, target: '/dev/ttyTEST', createTransport: () => transport, delay: async () => undefined },
      async display => {
        display.setDisplayNumber(3);
        await display.send();
        return display.getTube(0).digit;
      }
    );

    expect(result).toBe('3');
    expect(transport.getWrites()).toEqual(['$3,N,N,000,000,000,000!', '$-,N,N,000,000,000,000!']);
    expect(transport.isOpen()).toBe(false);
  });

  it('closes the display when the callback throws', async () => {
    const transport = new MemoryTransport('/dev/ttyTEST');
    await expect(
      withDisplay({ tubeCount: 1, target: '/dev/ttyTEST', createTransport: () => transport, delay: async () => undefined }, () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(transport.getOperations()).toEqual(['open', 'flush', 'write', 'close']);
  });
});
