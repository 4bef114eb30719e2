import type { DisplayState, TubeColor, TubeState, TubeUpdate } from '../types';
import type { NixieDisplay } from './displayCore';
import type { DisplayMetrics } from './displayTypes';

export interface DisplayStateResponse {
  state: DisplayState;
  target: string;
  tubeCount: number;
  brightness: number;
  color: TubeColor;
  tubes: TubeState[];
  frame: string;
  sequence: number;
}

export interface SendOptions {
  send?: boolean;
}

export interface MutationResponse {
  ok: true;
  frame: string;
  sent: boolean;
}

export interface SendResponse {
  sent: true;
  sequence: number;
  frame: string;
}

/**
 * Operations shared by the JSON-RPC host and the MCP/REST server. Each
 * mutation optionally transmits the resulting frame straight away.
 *
 * Mutations and sends are queued so that a frame is never written while
 * another one is still settling.
 */
export class DisplayApplicationService {
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private readonly display: NixieDisplay) {}

  public getState(): DisplayStateResponse {
    return {
      state: this.display.getState(),
      target: this.display.target,
      tubeCount: this.display.tubeCount,
      brightness: this.display.brightness,
      color: { red: this.display.red, green: this.display.green, blue: this.display.blue },
      tubes: this.display.getTubes(),
      frame: this.display.buildFrame(),
      sequence: this.display.getMetrics().sequence
    };
  }

  public getMetrics(): DisplayMetrics {
    return this.display.getMetrics();
  }

  public setNumber(value: number, options?: SendOptions): Promise<MutationResponse> {
    return this.mutate(() => this.display.setDisplayNumber(value), options);
  }

  public setTube(index: number, update: TubeUpdate, options?: SendOptions): Promise<MutationResponse> {
    return this.mutate(() => this.display.setTube(index, update), options);
  }

  public setBrightness(value: number, options?: SendOptions): Promise<MutationResponse> {
    return this.mutate(() => this.display.setBrightness(value), options);
  }

  public setColor(color: TubeColor, options?: SendOptions): Promise<MutationResponse> {
    return this.mutate(() => this.display.setColor(color), options);
  }

  public reset(options?: SendOptions): Promise<MutationResponse> {
    return this.mutate(() => this.display.reset(), options);
  }

  public blank(options?: SendOptions): Promise<MutationResponse> {
    return this.mutate(() => this.display.blank(), options);
  }

  public send(): Promise<SendResponse> {
    return this.exclusive<SendResponse>(async () => {
      await this.display.send();
      const metrics = this.display.getMetrics();
      return { sent: true, sequence: metrics.sequence, frame: metrics.lastFrame ?? this.display.buildFrame() };
    });
  }

  /** Waits for queued work, so the cleared frame never lands inside another frame's settle interval. */
  public close(): Promise<void> {
    return this.exclusive(() => this.display.close());
  }

  private mutate(apply: () => void, options?: SendOptions): Promise<MutationResponse> {
    return this.exclusive<MutationResponse>(async () => {
      apply();
      const sent = options?.send === true;
      if (sent) {
        await this.display.send();
      }
      return { ok: true, frame: this.display.buildFrame(), sent };
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    this.pending = run.catch(() => undefined);
    return run;
  }
}
