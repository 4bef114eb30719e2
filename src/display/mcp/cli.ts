#!/usr/bin/env node
import { loadDisplayConfig, toDisplayOptions } from '../config';
import { DisplayApplicationService } from '../displayApplicationService';
import { NixieDisplay } from '../displayCore';
import { getErrorMessage } from '../errors';
import { createStderrLogger } from '../host/logging';
import { createDisplayMcpServer } from './server';

const defaultPort = 8126;
const defaultHost = process.env.NIXIE_MCP_HOST ?? '127.0.0.1';
const defaultEndpoint = process.env.NIXIE_MCP_ENDPOINT ?? '/mcp';

const args = process.argv.slice(2);
const hostArg = args.find(arg => arg.startsWith('--host='));
const endpointArg = args.find(arg => arg.startsWith('--endpoint='));

const host = hostArg ? hostArg.split('=')[1] || defaultHost : defaultHost;
const endpointCandidate = endpointArg ? endpointArg.split('=')[1] || defaultEndpoint : defaultEndpoint;
const endpoint: `/${string}` = endpointCandidate.startsWith('/') ? `/${endpointCandidate.slice(1)}` : `/${endpointCandidate}`;

async function main(): Promise<void> {
  const logger = createStderrLogger({ verbose: args.includes('--verbose') });
  const config = loadDisplayConfig(args, process.env);
  const port = config.port ?? defaultPort;
  const display = await NixieDisplay.open(toDisplayOptions(config, logger));
  const displayApp = new DisplayApplicationService(display);
  const mcpServer = createDisplayMcpServer(displayApp, { endpoint, host, port });

  const shutdown = async (): Promise<void> => {
    await mcpServer.stop().catch(error => {
      process.stderr.write(`WARN mcp: Failed to stop server: ${getErrorMessage(error)}\n`);
    });
    await displayApp.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });

  try {
    await mcpServer.start();
  } catch (error) {
    await displayApp.close();
    throw error;
  }
  process.stderr.write(`INFO mcp: Display MCP server started on http://${host}:${port}${endpoint}\n`);
  process.stderr.write(`INFO mcp: Display REST API available at http://${host}:${port}/api/v1\n`);
}

void main().catch(error => {
  process.stderr.write(`ERROR mcp: Failed to start display MCP server: ${getErrorMessage(error)}\n`);
  process.exit(1);
});
