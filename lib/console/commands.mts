/**
 * Operator console commands
 *
 * Maps one line of operator input onto the bridge's commands and returns the
 * text to show, or null for blank input.
 */

import { STREAM_CONFIG } from '../StreamProtocol.mjs';
import { resolveEndpoint, type EnvConfig } from '../config/env.mjs';
import { createCaptureProducer } from '../capture/producers/index.mjs';
import type { Logger } from '../logging/logger.mjs';
import type { SensorBridge } from '../bridge/SensorBridge.mjs';

export const HELP = [
  'Commands:',
  '  connect [url]   open the connection (default from BRIDGE_URL / BRIDGE_HOST:BRIDGE_PORT)',
  '  disconnect      stop streaming and close the connection',
  '  start [ms]      start the simulated stream',
  '  stop            stop the simulated stream',
  '  attach          attach the capture producer (CAPTURE_COMMAND, else synthetic)',
  '  detach          detach the capture producer',
  '  state           print the connection state',
  '  stats           print counters',
  '  quit            tear down and exit',
].join('\n');

export async function handleCommand(
  bridge: SensorBridge,
  config: EnvConfig,
  line: string,
  logger?: Logger
): Promise<string | null> {
  const [command = '', arg] = line.trim().split(/\s+/);

  switch (command) {
    case '':
      return null;
    case 'connect': {
      const connected = await bridge.connect(arg ?? resolveEndpoint(config));
      return connected ? 'connected' : `connect failed (state: ${bridge.state()})`;
    }
    case 'disconnect':
      bridge.disconnect();
      return 'disconnected';
    case 'start': {
      const cadence = arg === undefined ? undefined : Number(arg);
      if (
        cadence !== undefined &&
        (!Number.isInteger(cadence) || cadence <= 0 || cadence > STREAM_CONFIG.MAX_CADENCE_MS)
      ) {
        return `invalid cadence: ${arg}`;
      }
      const result = bridge.startSimulatedStream(cadence);
      if (!result.ok) return result.error.message;
      return result.started ? 'streaming' : 'already streaming';
    }
    case 'stop':
      return bridge.stopSimulatedStream() ? 'stopped' : 'not streaming';
    case 'attach':
      bridge.attachCaptureProducer(createCaptureProducer(config, logger));
      return 'capture attached';
    case 'detach':
      return bridge.detachCaptureProducer() ? 'capture detached' : 'no capture attached';
    case 'state':
      return bridge.state();
    case 'stats':
      return JSON.stringify(bridge.getStats(), null, 2);
    case 'help':
      return HELP;
    case 'quit':
      return 'bye';
    default:
      return `unknown command: ${command}\n${HELP}`;
  }
}
