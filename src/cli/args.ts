/**
 * Argument parsing for the provision-service CLI
 *
 *   provision-service [apiKey] [stt:<id>] [tts:<id>] [embedding:<id>] [<id>...]
 *
 * Typed arguments always win. Bare ids fill the STT slot first, then TTS.
 * A leading argument with neither `:` nor `/` is the API key when more
 * arguments follow.
 */

import { ProvisionerError } from '../api/errors.js';
import { ALL_CAPABILITIES, CapabilityType, parseCapability } from '../types/capability.js';
import { MODEL_ID_SEPARATOR } from '../registry/response-extractor.js';
import type { ModelDescriptor } from '../types/models.js';

export interface CliArgs {
  help: boolean;
  apiKey?: string;
  models: ModelDescriptor[];
  /** Override for the configured service label */
  label?: string;
  /** Path to a provisioner.yaml */
  config?: string;
}

const BARE_ID_SLOTS: readonly CapabilityType[] = [CapabilityType.SPEECH_TO_TEXT, CapabilityType.TEXT_TO_SPEECH];

const TYPED_PREFIXES: ReadonlyMap<string, CapabilityType> = new Map([
  ['stt', CapabilityType.SPEECH_TO_TEXT],
  ['tts', CapabilityType.TEXT_TO_SPEECH],
  ['embedding', CapabilityType.EMBEDDING],
]);

/**
 * Split `stt:Systran/faster-whisper-base` into capability and id. Only the
 * first `:` separates; model ids themselves never start with a known prefix.
 */
function parseTyped(arg: string): ModelDescriptor | null {
  const separator = arg.indexOf(':');
  if (separator <= 0) {
    return null;
  }
  const prefix = arg.slice(0, separator).toLowerCase();
  const capability = TYPED_PREFIXES.get(prefix) ?? parseCapability(prefix);
  if (!capability) {
    return null;
  }
  const modelId = arg.slice(separator + 1).trim();
  if (!modelId) {
    throw new ProvisionerError('InvalidParams', `Missing model id in argument '${arg}'`);
  }
  return { modelId, capability };
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { help: false, models: [] };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--label' || arg === '--config') {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new ProvisionerError('InvalidParams', `Option ${arg} requires a value`);
      }
      if (arg === '--label') {
        result.label = value;
      } else {
        result.config = value;
      }
      i++;
    } else if (arg.startsWith('--')) {
      throw new ProvisionerError('InvalidParams', `Unknown option ${arg}`);
    } else if (arg.trim()) {
      positional.push(arg.trim());
    }
  }

  let rest = positional;
  const first = positional[0];
  if (first !== undefined && positional.length > 1 && !first.includes(':') && !first.includes(MODEL_ID_SEPARATOR)) {
    result.apiKey = first;
    rest = positional.slice(1);
  }

  const typed = new Map<CapabilityType, string>();
  const bare: string[] = [];
  for (const arg of rest) {
    const descriptor = parseTyped(arg);
    if (descriptor) {
      typed.set(descriptor.capability, descriptor.modelId);
    } else {
      bare.push(arg);
    }
  }

  const freeSlots = BARE_ID_SLOTS.filter((capability) => !typed.has(capability));
  for (const modelId of bare) {
    const capability = freeSlots.shift();
    if (!capability) {
      throw new ProvisionerError(
        'InvalidParams',
        `Too many model ids: '${modelId}' has no free slot (use stt:, tts: or embedding:)`
      );
    }
    typed.set(capability, modelId);
  }

  for (const capability of ALL_CAPABILITIES) {
    const modelId = typed.get(capability);
    if (modelId) {
      result.models.push({ modelId, capability });
    }
  }

  return result;
}

export function usage(): string {
  return `
provision-service - start the shared inference service and provision models

USAGE:
  provision-service [apiKey] [stt:<id>] [tts:<id>] [embedding:<id>] [<id>...]

ARGUMENTS:
  apiKey                    Bearer token; only taken as the key when more
                            arguments follow and it contains no ':' or '/'
  stt:<id>                  Speech-to-text model
  tts:<id>                  Text-to-speech model
  embedding:<id>            Speaker-embedding model
  <id>                      Untyped id; fills the STT slot, then TTS

OPTIONS:
  --label <label>           Service label (default from configuration)
  --config <path>           Path to provisioner.yaml
  --help                    Show this help message

EXAMPLES:
  provision-service stt:Systran/faster-whisper-base
  provision-service test-secret Systran/faster-whisper-base speaches-ai/Kokoro-82M-v1.0-ONNX

ENVIRONMENT VARIABLES:
  PROVISIONER_CONFIG        Path to provisioner.yaml
  PROVISIONER_LOG_LEVEL     pino log level (default: info)
`;
}
