#!/usr/bin/env node
import * as net from 'node:net';
import * as readline from 'node:readline';
import { loadDisplayConfig, toDisplayOptions } from '../config';
import { DisplayApplicationService } from '../displayApplicationService';
import { NixieDisplay } from '../displayCore';
import type { DisposableLike } from '../displayTypes';
import { getErrorMessage } from '../errors';
import { createLineSplitter } from './lineSplitter';
import { createStderrLogger } from './logging';
import { DisplayRpcDispatcher, type RpcResponse } from './rpc';

interface RpcEndpoint {
  send(payload: unknown): void;
}

const DEFAULT_PORT = 8125;

class DisplayHostServer {
  private readonly rl: readline.Interface;
  private readonly tcpClients = new Set<RpcEndpoint>();
  private readonly stdoutEndpoint: RpcEndpoint;
  private readonly frameSubscription: DisposableLike;
  private server?: net.Server;

  constructor(
    private readonly display: NixieDisplay,
    private readonly dispatcher: DisplayRpcDispatcher,
    private readonly options: { port: number }
  ) {
    this.stdoutEndpoint = {
      send: payload => {
        process.stdout.write(`${JSON.stringify(payload)}\n`);
      }
    };

    this.rl = readline.createInterface({ input: process.stdin });
    this.rl.on('line', line => this.handleLine(line, this.stdoutEndpoint));

    this.frameSubscription = this.display.onFrame(event => {
      this.broadcastNotification('display.frame', event);
    });
  }

  public start(): void {
    this.server = net.createServer(socket => {
      socket.setEncoding('utf8');
      const endpoint: RpcEndpoint = {
        send: payload => {
          if (socket.writable) {
            socket.write(`${JSON.stringify(payload)}\n`);
          }
        }
      };
      this.tcpClients.add(endpoint);

      socket.on('data', createLineSplitter(line => this.handleLine(line, endpoint)));

      const cleanup = (): void => {
        this.tcpClients.delete(endpoint);
      };

      socket.on('close', cleanup);
      socket.on('error', cleanup);
    });

    this.server.listen(this.options.port, '127.0.0.1', () => {
      const address = this.server?.address();
      const port = typeof address === 'object' && address ? address.port : undefined;
      this.broadcastNotification('host.ready', {
        message: 'Display host initialized',
        port,
        tubeCount: this.display.tubeCount,
        target: this.display.target
      });
    });
  }

  public dispose(): void {
    this.frameSubscription.dispose();
    this.rl.close();
    this.server?.close();
    this.tcpClients.clear();
  }

  private handleLine(line: string, endpoint: RpcEndpoint): void {
    this.dispatcher
      .handleLine(line)
      .then(response => this.reply(response, endpoint))
      .catch(error => {
        process.stderr.write(`ERROR host: ${getErrorMessage(error)}\n`);
      });
  }

  private reply(response: RpcResponse | undefined, endpoint: RpcEndpoint): void {
    if (response) {
      endpoint.send(response);
    }
  }

  private broadcastNotification(method: string, params: unknown): void {
    const payload = { jsonrpc: '2.0', method, params };
    this.stdoutEndpoint.send(payload);
    this.tcpClients.forEach(client => client.send(payload));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const logger = createStderrLogger({ verbose: args.includes('--verbose') });
  const config = loadDisplayConfig(args, process.env);
  const display = await NixieDisplay.open(toDisplayOptions(config, logger));
  const displayApp = new DisplayApplicationService(display);
  const dispatcher = new DisplayRpcDispatcher(displayApp);
  const server = new DisplayHostServer(display, dispatcher, { port: config.port ?? DEFAULT_PORT });
  server.start();

  const shutdown = async (): Promise<void> => {
    server.dispose();
    await displayApp.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

void main().catch(error => {
  process.stderr.write(`ERROR host: Failed to start display host: ${getErrorMessage(error)}\n`);
  process.exit(1);
});
