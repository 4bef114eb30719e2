import type { DisplayState } from '../types';

export interface DisposableLike {
  dispose(): void;
}

export interface DisplayTransport {
  readonly target: string;
  isOpen(): boolean;
  open(): Promise<void>;
  /** Discards pending inbound and outbound data. */
  flush(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface TransportOptions {
  baudRate: number;
  /** Errors the link reports outside of a pending call, e.g. a device unplugged mid-write. */
  onError?: (error: Error) => void;
}

export type TransportFactory = (target: string, options: TransportOptions) => DisplayTransport;

export interface DisplayFrameEvent {
  sequence: number;
  timestamp: number;
  frame: string;
}

export type DisplayFrameListener = (event: DisplayFrameEvent) => void;
export type DisplayStateListener = (state: DisplayState) => void;

export interface DisplayLogEvent {
  level: 'debug' | 'info' | 'warn' | 'error';
  scope: string;
  message: string;
  details?: Record<string, unknown>;
}

export type DisplayLogListener = (event: DisplayLogEvent) => void;

export interface DisplayMetrics {
  state: DisplayState;
  tubeCount: number;
  settleMs: number;
  sequence: number;
  framesSent: number;
  sendFailures: number;
  lastFrame?: string;
  lastSendAt?: number;
}
