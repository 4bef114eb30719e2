#!/usr/bin/env node
import * as net from 'node:net';
import { getErrorMessage } from '../errors';
import { createLineSplitter } from './lineSplitter';
import { buildClientRequest, CLIENT_COMMANDS, type ClientRequest } from './clientCommands';

const HOST = process.env.NIXIE_HOST ?? '127.0.0.1';
const PORT = Number.parseInt(process.env.NIXIE_PORT ?? '8125', 10);
const args = process.argv.slice(2);

if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
  printHelp();
  process.exit(args.length === 0 ? 1 : 0);
}

let request: ClientRequest;
try {
  request = buildClientRequest(args);
} catch (error) {
  console.error(getErrorMessage(error));
  printHelp();
  process.exit(1);
}

const requestId = Date.now();
const payload = JSON.stringify({ jsonrpc: '2.0', id: requestId, method: request.method, params: request.params }) + '\n';

const socket = net.createConnection({ host: HOST, port: PORT }, () => {
  socket.write(payload);
});

socket.setEncoding('utf8');
socket.on(
  'data',
  createLineSplitter(line => {
    const trimmed = line.trim();
    if (trimmed.length > 0) {
      handleLine(trimmed);
    }
  })
);

socket.on('error', error => {
  console.error(`Connection error: ${error.message}`);
  process.exit(1);
});

socket.on('end', () => {
  process.exit(0);
});

function handleLine(line: string): void {
  let message: unknown;
  try {
    message = JSON.parse(line);
  } catch {
    console.error('Malformed JSON from host:', line);
    return;
  }
  if (typeof message !== 'object' || message === null) {
    return;
  }

  if ('id' in message && message.id === requestId) {
    if ('error' in message && message.error) {
      console.error('RPC error:', JSON.stringify(message.error, null, 2));
      process.exit(1);
    }
    console.log(JSON.stringify('result' in message ? message.result : null, null, 2));
    socket.end();
  } else if ('method' in message && typeof message.method === 'string') {
    console.log(JSON.stringify(message, null, 2));
  }
}

function printHelp(): void {
  console.log('Usage: nixie <command> [args] [--send]\n');
  console.log('Commands:');
  Object.entries(CLIENT_COMMANDS).forEach(([name, conf]) => {
    console.log(`  ${name.padEnd(10)} - ${conf.description}`);
  });
  console.log('\nEnvironment variables:');
  console.log('  NIXIE_HOST  Hostname to connect (default 127.0.0.1)');
  console.log('  NIXIE_PORT  Port number (default 8125)');
}
