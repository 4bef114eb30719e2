export type ClientParams = Record<string, unknown>;

export interface ClientCommand {
  method: string;
  buildParams: (args: string[]) => ClientParams;
  description: string;
}

export interface ClientRequest {
  method: string;
  params: ClientParams;
}

const tubeKeys: Record<string, string> = {
  digit: 'digit',
  ldp: 'leftDecimalPoint',
  rdp: 'rightDecimalPoint',
  brightness: 'brightness',
  red: 'red',
  green: 'green',
  blue: 'blue'
};

export const CLIENT_COMMANDS: Record<string, ClientCommand> = {
  ping: {
    method: 'ping',
    buildParams: () => ({}),
    description: 'Ensure the display host is reachable.'
  },
  state: {
    method: 'display.state.get',
    buildParams: () => ({}),
    description: 'Fetch every tube and the frame that would be sent.'
  },
  metrics: {
    method: 'display.metrics.get',
    buildParams: () => ({}),
    description: 'Fetch frame counters.'
  },
  number: {
    method: 'display.number.set',
    buildParams: ([value]) => {
      if (value === undefined) throw new Error('Missing number. Usage: nixie number 42');
      return { value: parseNumber('number', value) };
    },
    description: 'Show a non-negative integer across the tubes. Usage: nixie number 42'
  },
  tube: {
    method: 'display.tube.set',
    buildParams: ([index, ...assignments]) => {
      if (index === undefined) throw new Error('Missing tube index. Usage: nixie tube 0 digit=5 ldp=true');
      const params: ClientParams = { index: parseNumber('tube index', index) };
      assignments.forEach(assignment => {
        const [name = '', value = ''] = assignment.split('=');
        const key = tubeKeys[name];
        if (!key) throw new Error(`Unknown tube field: ${name}`);
        if (key === 'digit') {
          params[key] = value;
        } else if (key === 'leftDecimalPoint' || key === 'rightDecimalPoint') {
          params[key] = parseFlag(name, value);
        } else {
          params[key] = parseNumber(name, value);
        }
      });
      return params;
    },
    description: 'Update one tube. Fields: digit, ldp, rdp, brightness, red, green, blue. Usage: nixie tube 0 digit=5 ldp=true'
  },
  brightness: {
    method: 'display.brightness.set',
    buildParams: ([value]) => {
      if (value === undefined) throw new Error('Missing brightness. Usage: nixie brightness 128');
      return { value: parseNumber('brightness', value) };
    },
    description: 'Set the brightness of every tube (0-255).'
  },
  color: {
    method: 'display.color.set',
    buildParams: ([red, green, blue]) => {
      if (red === undefined || green === undefined || blue === undefined) {
        throw new Error('Missing colour. Usage: nixie color 0 0 255');
      }
      return { red: parseNumber('red', red), green: parseNumber('green', green), blue: parseNumber('blue', blue) };
    },
    description: 'Set the backlight colour of every tube. Usage: nixie color 0 0 255'
  },
  reset: {
    method: 'display.reset',
    buildParams: () => ({}),
    description: 'Blank digits and zero brightness and colour (decimal points stay).'
  },
  blank: {
    method: 'display.blank',
    buildParams: () => ({}),
    description: 'Turn every tube fully off.'
  },
  send: {
    method: 'display.send',
    buildParams: () => ({}),
    description: 'Transmit the current frame.'
  },
  rpc: {
    method: '',
    buildParams: ([, json]) => parseJsonParams(json),
    description: 'Send an arbitrary JSON-RPC method. Usage: nixie rpc display.color.set {"red":0,"green":0,"blue":255}'
  }
};

/**
 * Turns command-line arguments into a JSON-RPC method and params. A
 * trailing `--send` asks the host to transmit right after the change.
 */
export function buildClientRequest(args: string[]): ClientRequest {
  const send = args.includes('--send');
  const [commandName = '', ...commandArgs] = args.filter(arg => arg !== '--send');
  const command = CLIENT_COMMANDS[commandName];
  if (!command) {
    throw new Error(`Unknown command: ${commandName}`);
  }

  const params = command.buildParams(commandArgs);
  if (send) {
    params.send = true;
  }

  if (commandName === 'rpc') {
    const [method] = commandArgs;
    if (!method) throw new Error('Usage: nixie rpc <method> [jsonParams]');
    return { method, params };
  }
  return { method: command.method, params };
}

function parseJsonParams(json: string | undefined): ClientParams {
  if (!json) {
    return {};
  }
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('JSON params must be an object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`Expected a number for ${name}, got "${raw}"`);
  }
  return value;
}

function parseFlag(name: string, raw: string): boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new Error(`Expected true or false for ${name}, got "${raw}"`);
}
