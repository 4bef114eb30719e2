export const TUBE_DIGITS = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', '-'] as const;

// '-' blanks the tube.
export type TubeDigit = (typeof TUBE_DIGITS)[number];

export type ColorChannel = 'red' | 'green' | 'blue';

export type LevelField = 'brightness' | ColorChannel;

export interface TubeColor {
  red: number;
  green: number;
  blue: number;
}

export interface TubeState extends TubeColor {
  digit: TubeDigit;
  leftDecimalPoint: boolean;
  rightDecimalPoint: boolean;
  brightness: number;
}

export interface TubeUpdate {
  digit?: string;
  leftDecimalPoint?: boolean;
  rightDecimalPoint?: boolean;
  brightness?: number;
  red?: number;
  green?: number;
  blue?: number;
}

export type DisplayState = 'open' | 'closed';
