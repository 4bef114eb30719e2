import { SerialPort } from 'serialport';
import type { DisplayTransport, TransportOptions } from '../displayTypes';

type PortCallback = (error: Error | null | undefined) => void;

/** The part of a `serialport` stream the transport drives. */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback: PortCallback): void;
  flush(callback: PortCallback): void;
  write(data: Buffer, callback: PortCallback): boolean;
  drain(callback: PortCallback): void;
  close(callback: PortCallback): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface SerialPortOpenOptions {
  path: string;
  baudRate: number;
  dataBits: 8;
  parity: 'none';
  stopBits: 1;
  autoOpen: false;
}

export interface SerialTransportOptions extends TransportOptions {
  createPort?: (options: SerialPortOpenOptions) => SerialPortHandle;
}

/** 8N1 link to the first tube of the chain. */
export class SerialTransport implements DisplayTransport {
  private readonly port: SerialPortHandle;

  constructor(
    public readonly target: string,
    options: SerialTransportOptions
  ) {
    const openOptions: SerialPortOpenOptions = {
      path: target,
      baudRate: options.baudRate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      autoOpen: false
    };
    this.port = options.createPort ? options.createPort(openOptions) : new SerialPort(openOptions);
    // A failed write reaches its callback and is then emitted again as a
    // stream 'error'; without a listener that would crash the process.
    this.port.on('error', error => options.onError?.(error));
  }

  public isOpen(): boolean {
    return this.port.isOpen;
  }

  public open(): Promise<void> {
    return this.call(callback => this.port.open(callback));
  }

  public flush(): Promise<void> {
    return this.call(callback => this.port.flush(callback));
  }

  public async write(data: Uint8Array): Promise<void> {
    const buffer = Buffer.from(data);
    await this.call(callback => {
      this.port.write(buffer, callback);
    });
    await this.call(callback => this.port.drain(callback));
  }

  public close(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve();
    }
    return this.call(callback => this.port.close(callback));
  }

  private call(operation: (callback: PortCallback) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      operation(error => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
