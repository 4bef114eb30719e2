import { FastMCP } from 'fastmcp';
import type { Context as HonoContext, Hono } from 'hono';
import { z } from 'zod';
import type { DisplayApplicationService } from '../displayApplicationService';
import { getErrorMessage, isNixieDisplayError, type NixieDisplayErrorCode } from '../errors';
import {
  sendOptionSchema,
  setBrightnessSchema,
  setColorSchema,
  setNumberSchema,
  setTubeSchema,
  toIssues
} from '../schemas';

export interface DisplayMcpServerOptions {
  endpoint?: `/${string}`;
  host?: string;
  port: number;
}

export interface DisplayMcpServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

const jsonString = (value: unknown): string => JSON.stringify(value, null, 2);

export function createDisplayMcpServer(
  displayApp: DisplayApplicationService,
  options: DisplayMcpServerOptions
): DisplayMcpServer {
  const server = new FastMCP({
    instructions:
      'Use nixie_display_* tools to change digits, brightness and colour on the tube display. Pass send=true, or call nixie_display_send, to transmit.',
    name: 'nixie-display-mcp',
    version: '0.1.0'
  });

  registerTools(server, displayApp);
  registerResources(server, displayApp);
  registerRestRoutes(server.getApp(), displayApp);

  return {
    start: () =>
      server.start({
        httpStream: {
          endpoint: options.endpoint ?? '/mcp',
          host: options.host ?? '127.0.0.1',
          port: options.port
        },
        transportType: 'httpStream'
      }),
    stop: () => server.stop()
  };
}

function registerTools(server: FastMCP, displayApp: DisplayApplicationService): void {
  server.addTool({
    description: 'Get every tube, the display-level brightness and colour, and the frame that would be sent.',
    execute: async () => jsonString(displayApp.getState()),
    name: 'nixie_display_get_state',
    parameters: z.object({})
  });

  server.addTool({
    description: 'Get frame counters such as frames sent and send failures.',
    execute: async () => jsonString(displayApp.getMetrics()),
    name: 'nixie_display_get_metrics',
    parameters: z.object({})
  });

  server.addTool({
    description: 'Show a non-negative integer, left-padded with zeroes, the first tube holding the most significant digit.',
    execute: async ({ value, send }) => jsonString(await displayApp.setNumber(value, { send })),
    name: 'nixie_display_set_number',
    parameters: setNumberSchema
  });

  server.addTool({
    description: 'Update one tube: digit (0-9 or - for blank), decimal points, brightness and RGB (0-255).',
    execute: async ({ index, send, ...update }) => jsonString(await displayApp.setTube(index, update, { send })),
    name: 'nixie_display_set_tube',
    parameters: setTubeSchema
  });

  server.addTool({
    description: 'Set the brightness of every tube (0-255).',
    execute: async ({ value, send }) => jsonString(await displayApp.setBrightness(value, { send })),
    name: 'nixie_display_set_brightness',
    parameters: setBrightnessSchema
  });

  server.addTool({
    description: 'Set the RGB backlight of every tube (0-255 per channel).',
    execute: async ({ send, ...color }) => jsonString(await displayApp.setColor(color, { send })),
    name: 'nixie_display_set_color',
    parameters: setColorSchema
  });

  server.addTool({
    description: 'Blank every digit and zero brightness and colour. Decimal points are kept.',
    execute: async ({ send }) => jsonString(await displayApp.reset({ send })),
    name: 'nixie_display_reset',
    parameters: sendOptionSchema
  });

  server.addTool({
    description: 'Turn every tube fully off, decimal points included.',
    execute: async ({ send }) => jsonString(await displayApp.blank({ send })),
    name: 'nixie_display_blank',
    parameters: sendOptionSchema
  });

  server.addTool({
    description: 'Transmit the current frame to the display.',
    execute: async () => jsonString(await displayApp.send()),
    name: 'nixie_display_send',
    parameters: z.object({})
  });
}

function registerResources(server: FastMCP, displayApp: DisplayApplicationService): void {
  server.addResource({
    description: 'Current state of every tube and the pending frame.',
    load: async () => ({
      mimeType: 'application/json',
      text: jsonString(displayApp.getState())
    }),
    mimeType: 'application/json',
    name: 'nixie-display-state',
    uri: 'resource://nixie-display/state'
  });

  server.addResource({
    description: 'Frame counters snapshot.',
    load: async () => ({
      mimeType: 'application/json',
      text: jsonString(displayApp.getMetrics())
    }),
    mimeType: 'application/json',
    name: 'nixie-display-metrics',
    uri: 'resource://nixie-display/metrics'
  });
}

export function registerRestRoutes(app: Hono, displayApp: DisplayApplicationService): void {
  app.get('/api/v1', c =>
    c.json({
      endpoints: {
        blank: '/api/v1/display/blank',
        brightness: '/api/v1/display/brightness',
        color: '/api/v1/display/color',
        health: '/api/v1/health',
        metrics: '/api/v1/display/metrics',
        number: '/api/v1/display/number',
        reset: '/api/v1/display/reset',
        send: '/api/v1/display/send',
        state: '/api/v1/display/state',
        tube: '/api/v1/display/tube'
      },
      mcpEndpoint: '/mcp'
    })
  );

  app.get('/api/v1/health', c =>
    c.json({
      service: 'nixie-display-mcp',
      status: 'ok'
    })
  );

  app.get('/api/v1/display/state', c => c.json(displayApp.getState()));
  app.get('/api/v1/display/metrics', c => c.json(displayApp.getMetrics()));

  app.post(
    '/api/v1/display/number',
    jsonRoute(setNumberSchema, body => displayApp.setNumber(body.value, { send: body.send }))
  );
  app.post(
    '/api/v1/display/tube',
    jsonRoute(setTubeSchema, ({ index, send, ...update }) => displayApp.setTube(index, update, { send }))
  );
  app.post(
    '/api/v1/display/brightness',
    jsonRoute(setBrightnessSchema, body => displayApp.setBrightness(body.value, { send: body.send }))
  );
  app.post(
    '/api/v1/display/color',
    jsonRoute(setColorSchema, ({ send, ...color }) => displayApp.setColor(color, { send }))
  );
  app.post('/api/v1/display/reset', jsonRoute(sendOptionSchema, body => displayApp.reset(body)));
  app.post('/api/v1/display/blank', jsonRoute(sendOptionSchema, body => displayApp.blank(body)));
  app.post('/api/v1/display/send', jsonRoute(z.object({}), () => displayApp.send()));
}

const errorStatus: Record<NixieDisplayErrorCode, 400 | 502 | 503> = {
  invalid_argument: 400,
  out_of_range: 400,
  transport_unavailable: 503,
  transport_error: 502
};

// A missing or unparsable body is validated as `{}`.
function jsonRoute<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (body: T) => Promise<unknown>
): (c: HonoContext) => Promise<Response> {
  return async c => {
    const body: unknown = await c.req.json().catch(() => ({}));
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ code: 'invalid_params', issues: toIssues(parsed.error.issues) }, 400);
    }
    return handler(parsed.data).then(
      result => c.json(result),
      (error: unknown) => {
        const message = getErrorMessage(error);
        return isNixieDisplayError(error)
          ? c.json({ code: error.code, message }, errorStatus[error.code])
          : c.json({ code: 'internal_error', message }, 500);
      }
    );
  };
}
