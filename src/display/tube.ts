import type { TubeDigit, TubeState, TubeUpdate } from '../types';
import { coerceDigit, requireFlag, requireLevel } from './validation';

export const BLANK_TUBE: Readonly<TubeState> = Object.freeze({
  digit: '-',
  leftDecimalPoint: false,
  rightDecimalPoint: false,
  brightness: 0,
  red: 0,
  green: 0,
  blue: 0
});

/**
 * State of one tube in the chain: the digit, both decimal points, the
 * tube brightness and the RGB backlight.
 *
 * Fields are only written through the setters, so every stored value is
 * within its legal range at all times.
 */
export class NixieTube {
  private currentDigit: TubeDigit = BLANK_TUBE.digit;
  private currentLeftDecimalPoint = BLANK_TUBE.leftDecimalPoint;
  private currentRightDecimalPoint = BLANK_TUBE.rightDecimalPoint;
  private currentBrightness = BLANK_TUBE.brightness;
  private currentRed = BLANK_TUBE.red;
  private currentGreen = BLANK_TUBE.green;
  private currentBlue = BLANK_TUBE.blue;

  constructor(init?: TubeUpdate) {
    if (init) {
      this.apply(init);
    }
  }

  public get digit(): TubeDigit {
    return this.currentDigit;
  }

  public get leftDecimalPoint(): boolean {
    return this.currentLeftDecimalPoint;
  }

  public get rightDecimalPoint(): boolean {
    return this.currentRightDecimalPoint;
  }

  public get brightness(): number {
    return this.currentBrightness;
  }

  public get red(): number {
    return this.currentRed;
  }

  public get green(): number {
    return this.currentGreen;
  }

  public get blue(): number {
    return this.currentBlue;
  }

  /** Anything other than `0`-`9` or `-` stores `-`. */
  public setDigit(value: string): void {
    this.currentDigit = coerceDigit(value);
  }

  public setLeftDecimalPoint(value: boolean): void {
    this.currentLeftDecimalPoint = requireFlag('left decimal point', value);
  }

  public setRightDecimalPoint(value: boolean): void {
    this.currentRightDecimalPoint = requireFlag('right decimal point', value);
  }

  public setBrightness(value: number): void {
    this.currentBrightness = requireLevel('brightness', value);
  }

  public setRed(value: number): void {
    this.currentRed = requireLevel('red', value);
  }

  public setGreen(value: number): void {
    this.currentGreen = requireLevel('green', value);
  }

  public setBlue(value: number): void {
    this.currentBlue = requireLevel('blue', value);
  }

  /**
   * Applies every field present in `update`. Fields are validated before any
   * of them is stored, so a rejected update leaves the tube unchanged.
   */
  public apply(update: TubeUpdate): void {
    const next = new NixieTube();
    next.copyFrom(this);
    if (update.digit !== undefined) next.setDigit(update.digit);
    if (update.leftDecimalPoint !== undefined) next.setLeftDecimalPoint(update.leftDecimalPoint);
    if (update.rightDecimalPoint !== undefined) next.setRightDecimalPoint(update.rightDecimalPoint);
    if (update.brightness !== undefined) next.setBrightness(update.brightness);
    if (update.red !== undefined) next.setRed(update.red);
    if (update.green !== undefined) next.setGreen(update.green);
    if (update.blue !== undefined) next.setBlue(update.blue);
    this.copyFrom(next);
  }

  public turnOff(): void {
    this.copyFrom(BLANK_TUBE);
  }

  public snapshot(): TubeState {
    return {
      digit: this.currentDigit,
      leftDecimalPoint: this.currentLeftDecimalPoint,
      rightDecimalPoint: this.currentRightDecimalPoint,
      brightness: this.currentBrightness,
      red: this.currentRed,
      green: this.currentGreen,
      blue: this.currentBlue
    };
  }

  /**
   * `DIGIT,LDP,RDP,BRIGHTNESS,RED,GREEN,BLUE`, e.g. `5,N,Y,128,000,000,255`.
   * The display adds the `$` prefix and the `!` latch.
   */
  public encodeFragment(): string {
    return [
      this.currentDigit,
      toYesNo(this.currentLeftDecimalPoint),
      toYesNo(this.currentRightDecimalPoint),
      toLevelField(this.currentBrightness),
      toLevelField(this.currentRed),
      toLevelField(this.currentGreen),
      toLevelField(this.currentBlue)
    ].join(',');
  }

  private copyFrom(source: Readonly<TubeState>): void {
    this.currentDigit = source.digit;
    this.currentLeftDecimalPoint = source.leftDecimalPoint;
    this.currentRightDecimalPoint = source.rightDecimalPoint;
    this.currentBrightness = source.brightness;
    this.currentRed = source.red;
    this.currentGreen = source.green;
    this.currentBlue = source.blue;
  }
}

export function toYesNo(value: boolean): 'Y' | 'N' {
  return value ? 'Y' : 'N';
}

export function toLevelField(value: number): string {
  return String(value).padStart(3, '0');
}
