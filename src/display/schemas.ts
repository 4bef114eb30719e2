import { z } from 'zod';

// Shapes only; ranges are enforced by the display so every surface reports
// the same error codes. Numbers must arrive as JSON numbers: `null` is
// rejected rather than read as 0.
const sendFlag = z.boolean().optional();

export const setNumberSchema = z.object({
  value: z.number(),
  send: sendFlag
});

export const setTubeSchema = z.object({
  index: z.number(),
  digit: z.union([z.string(), z.number()]).transform(String).optional(),
  leftDecimalPoint: z.boolean().optional(),
  rightDecimalPoint: z.boolean().optional(),
  brightness: z.number().optional(),
  red: z.number().optional(),
  green: z.number().optional(),
  blue: z.number().optional(),
  send: sendFlag
});

export const setBrightnessSchema = z.object({
  value: z.number(),
  send: sendFlag
});

export const setColorSchema = z.object({
  red: z.number(),
  green: z.number(),
  blue: z.number(),
  send: sendFlag
});

export const sendOptionSchema = z.object({
  send: sendFlag
});

export interface ParamIssue {
  path: string;
  message: string;
}

export function toIssues(issues: z.ZodIssue[]): ParamIssue[] {
  return issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
}
