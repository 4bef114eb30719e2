import { z } from 'zod';
import type { DisplayApplicationService } from '../displayApplicationService';
import { getErrorMessage, isNixieDisplayError } from '../errors';
import {
  sendOptionSchema,
  setBrightnessSchema,
  setColorSchema,
  setNumberSchema,
  setTubeSchema,
  toIssues,
  type ParamIssue
} from '../schemas';

type RpcId = number | string;

const requestSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional()
});

export type RpcRequest = z.infer<typeof requestSchema>;

export interface RpcError {
  code: string;
  message?: string;
  issues?: ParamIssue[];
}

export type RpcResponse =
  | { jsonrpc: '2.0'; id: RpcId | null; result: unknown }
  | { jsonrpc: '2.0'; id: RpcId | null; error: RpcError };

type MethodHandler = (params: unknown) => Promise<unknown> | unknown;

class InvalidParamsError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super('Invalid params');
    this.name = 'InvalidParamsError';
  }
}

/**
 * Newline-delimited JSON-RPC 2.0 over the display operations. Requests
 * without an `id` are treated as notifications and get no response.
 */
export class DisplayRpcDispatcher {
  private readonly methods: Record<string, MethodHandler>;

  constructor(private readonly app: DisplayApplicationService) {
    this.methods = {
      ping: () => 'pong',
      'display.state.get': () => this.app.getState(),
      'display.metrics.get': () => this.app.getMetrics(),
      'display.number.set': params => {
        const { value, send } = parseParams(setNumberSchema, params);
        return this.app.setNumber(value, { send });
      },
      'display.tube.set': params => {
        const { index, send, ...update } = parseParams(setTubeSchema, params);
        return this.app.setTube(index, update, { send });
      },
      'display.brightness.set': params => {
        const { value, send } = parseParams(setBrightnessSchema, params);
        return this.app.setBrightness(value, { send });
      },
      'display.color.set': params => {
        const { send, ...color } = parseParams(setColorSchema, params);
        return this.app.setColor(color, { send });
      },
      'display.reset': params => this.app.reset(parseParams(sendOptionSchema, params)),
      'display.blank': params => this.app.blank(parseParams(sendOptionSchema, params)),
      'display.send': () => this.app.send()
    };
  }

  public getMethodNames(): string[] {
    return Object.keys(this.methods);
  }

  public async handleLine(line: string): Promise<RpcResponse | undefined> {
    if (!line || line.trim().length === 0) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return errorResponse(null, { code: 'invalid_json' });
    }

    const request = requestSchema.safeParse(raw);
    if (!request.success) {
      return errorResponse(null, { code: 'invalid_request', issues: toIssues(request.error.issues) });
    }
    return this.handle(request.data);
  }

  public async handle(request: RpcRequest): Promise<RpcResponse | undefined> {
    const id = request.id;
    const handler = this.methods[request.method];
    if (!handler) {
      return id === undefined ? undefined : errorResponse(id, { code: 'method_not_found' });
    }

    try {
      const result = await handler(request.params ?? {});
      return id === undefined ? undefined : { jsonrpc: '2.0', id, result };
    } catch (error) {
      return id === undefined ? undefined : errorResponse(id, toRpcError(error));
    }
  }
}

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidParamsError(parsed.error.issues);
  }
  return parsed.data;
}

function toRpcError(error: unknown): RpcError {
  if (error instanceof InvalidParamsError) {
    return { code: 'invalid_params', issues: toIssues(error.issues) };
  }
  if (isNixieDisplayError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'internal_error', message: getErrorMessage(error) };
}

function errorResponse(id: RpcId | null, error: RpcError): RpcResponse {
  return { jsonrpc: '2.0', id, error };
}
