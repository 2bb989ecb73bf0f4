/**
 * Capability Types
 *
 * Functional categories a managed-service model can belong to, and the
 * registry task label each one is queried under.
 */

/**
 * Model capability class
 */
export enum CapabilityType {
  /** Transcription (automatic speech recognition) */
  SPEECH_TO_TEXT = 'STT',

  /** Speech synthesis */
  TEXT_TO_SPEECH = 'TTS',

  /** Speaker embedding vectors */
  EMBEDDING = 'EMBEDDING',
}

/**
 * Registry task label for each capability (`/v1/registry?task=<label>`)
 */
export const CAPABILITY_TASKS: Readonly<Record<CapabilityType, string>> = {
  [CapabilityType.SPEECH_TO_TEXT]: 'automatic-speech-recognition',
  [CapabilityType.TEXT_TO_SPEECH]: 'text-to-speech',
  [CapabilityType.EMBEDDING]: 'speaker-embedding',
};

export const ALL_CAPABILITIES: readonly CapabilityType[] = [
  CapabilityType.SPEECH_TO_TEXT,
  CapabilityType.TEXT_TO_SPEECH,
  CapabilityType.EMBEDDING,
];

export function taskLabelFor(capability: CapabilityType): string {
  return CAPABILITY_TASKS[capability];
}

const CAPABILITY_ALIASES: ReadonlyMap<string, CapabilityType> = new Map<string, CapabilityType>([
  ['STT', CapabilityType.SPEECH_TO_TEXT],
  ['SPEECH_TO_TEXT', CapabilityType.SPEECH_TO_TEXT],
  ['TTS', CapabilityType.TEXT_TO_SPEECH],
  ['TEXT_TO_SPEECH', CapabilityType.TEXT_TO_SPEECH],
  ['EMBEDDING', CapabilityType.EMBEDDING],
]);

/**
 * Resolve a caller-supplied key (`STT`, `tts`, `TEXT_TO_SPEECH`, ...) to a capability.
 */
export function parseCapability(value: string): CapabilityType | undefined {
  return CAPABILITY_ALIASES.get(value.trim().toUpperCase());
}
