import { SerialPortMock } from 'serialport';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { NixieDisplay } from '../src/display/displayCore';
import type { DisplayLogEvent } from '../src/display/displayTypes';
import { TransportError } from '../src/display/errors';
import { SerialTransport, type SerialPortOpenOptions } from '../src/display/transport/serialTransport';

const PATH = '/dev/ttyMOCK0';

interface MockFixture {
  transport: SerialTransport;
  ports: SerialPortMock[];
  openOptions: SerialPortOpenOptions[];
}

function createFixture(path = PATH, baudRate = 115200): MockFixture {
  const ports: SerialPortMock[] = [];
  const openOptions: SerialPortOpenOptions[] = [];
  const transport = new SerialTransport(path, {
    baudRate,
    createPort: options => {
      openOptions.push(options);
      const port = new SerialPortMock(options);
      ports.push(port);
      return port;
    }
  });
  return { transport, ports, openOptions };
}

function recording(port: SerialPortMock | undefined): string {
  return port?.port?.recording.toString('ascii') ?? '';
}

afterEach(() => {
  SerialPortMock.binding.reset();
});

describe('SerialTransport', () => {
  it('opens the device as an 8N1 link without auto-opening', async () => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
    const { transport, openOptions } = createFixture(PATH, 9600);

    expect(transport.isOpen()).toBe(false);
    await transport.open();

    expect(transport.isOpen()).toBe(true);
    expect(openOptions).toEqual([
      { path: PATH, baudRate: 9600, dataBits: 8, parity: 'none', stopBits: 1, autoOpen: false }
    ]);
    await transport.close();
  });

  it('writes bytes to the port', async () => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
    const { transport, ports } = createFixture();
    await transport.open();

    await transport.flush();
    await transport.write(Buffer.from('$1,N,N,000,000,000,000!', 'ascii'));

    expect(recording(ports[0])).toBe('$1,N,N,000,000,000,000!');
    await transport.close();
  });

  it('rejects when the device does not exist', async () => {
    const { transport } = createFixture('/dev/ttyMISSING');
    await expect(transport.open()).rejects.toThrow();
    expect(transport.isOpen()).toBe(false);
  });

  it('closes once and then ignores further closes', async () => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
    const { transport } = createFixture();
    await transport.open();

    await transport.close();
    expect(transport.isOpen()).toBe(false);
    await expect(transport.close()).resolves.toBeUndefined();
  });

  it('carries display frames to the wire', async () => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
    const ports: SerialPortMock[] = [];
    const display = await NixieDisplay.open({
      tubeCount: 2,
      target: PATH,
      brightness: 128,
      blue: 255,
      delay: async () => undefined,
      createTransport: (target, options) =>
        new SerialTransport(target, {
          ...options,
          createPort: openOptions => {
            const port = new SerialPortMock(openOptions);
            ports.push(port);
            return port;
          }
        })
    });

    display.setDisplayNumber(7);
    await display.send();
    expect(recording(ports[0])).toBe('$7,N,N,128,000,000,255$0,N,N,128,000,000,255!');

    await display.close();
    expect(display.getMetrics().lastFrame).toBe('$-,N,N,000,000,000,000$-,N,N,000,000,000,000!');
    expect(ports[0]?.isOpen).toBe(false);
  });

  it('reports a missing device when the display opens', async () => {
    await expect(
      NixieDisplay.open({
        tubeCount: 1,
        target: '/dev/ttyMISSING',
        createTransport: (target, options) =>
          new SerialTransport(target, { ...options, createPort: openOptions => new SerialPortMock(openOptions) })
      })
    ).rejects.toThrow('Error opening serial port /dev/ttyMISSING');
  });

  it('reports a failed write to the caller and keeps the process alive', async () => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
    const ports: SerialPortMock[] = [];
    const logs: DisplayLogEvent[] = [];
    const display = await NixieDisplay.open({
      tubeCount: 1,
      target: PATH,
      delay: async () => undefined,
      logger: event => logs.push(event),
      createTransport: (target, options) =>
        new SerialTransport(target, {
          ...options,
          createPort: openOptions => {
            const port = new SerialPortMock(openOptions);
            ports.push(port);
            return port;
          }
        })
    });
    const binding = ports[0]?.port;
    if (!binding) {
      expect.fail('mock port was not opened');
    }
    vi.spyOn(binding, 'write').mockRejectedValue(new Error('EIO'));

    const failure = display.send();
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow('Transport write failed: EIO');
    await new Promise(resolve => setImmediate(resolve));

    expect(ports[0]?.listenerCount('error')).toBeGreaterThanOrEqual(1);
    expect(logs).toContainEqual({
      level: 'warn',
      scope: 'transport',
      message: `Serial port ${PATH} reported an error: EIO`
    });

    await display.close();
    expect(display.getState()).toBe('closed');
  });
});
