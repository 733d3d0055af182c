import { ACTION_CODES, ActionCode, Command, VOLUME_OPERATORS, VolumeOperator } from './commandTypes';

export const VOLUME_MIN = 0;
export const VOLUME_MAX = 100;

export type VolumeCommand =
  | { ok: true; operator: VolumeOperator; amount: number }
  | { ok: false; reason: string };

export function isActionCode(value: string): value is ActionCode {
  return ACTION_CODES.some((code) => code === value);
}

function isVolumeOperator(value: string): value is VolumeOperator {
  return VOLUME_OPERATORS.some((operator) => operator === value);
}

/** Decodes a raw payload as UTF-8 and trims surrounding whitespace. */
export function decodePayload(payload: Buffer | string): string {
  return (typeof payload === 'string' ? payload : payload.toString('utf8')).trim();
}

/**
 * Builds a {@link Command} from a topic suffix and payload.
 * Returns undefined when the suffix is not a known action code.
 */
export function decodeCommand(topicSuffix: string, payload: Buffer | string): Command | undefined {
  if (!isActionCode(topicSuffix)) return undefined;
  return { name: topicSuffix, value: decodePayload(payload) };
}

/**
 * Parses `<operator><digits>`, e.g. `=40`, `+5`, `-10`.
 */
export function parseVolumeCommand(value: string): VolumeCommand {
  if (!value || value.length < 2) {
    return { ok: false, reason: `Invalid volume control parameter: "${value}"` };
  }

  const operator = value[0];
  const digits = value.slice(1);
  if (!/^\d+$/.test(digits)) {
    return { ok: false, reason: `Invalid volume setting value: "${digits}"` };
  }
  if (!isVolumeOperator(operator)) {
    return { ok: false, reason: `Unknown volume control operator: "${operator}"` };
  }
  return { ok: true, operator, amount: Number.parseInt(digits, 10) };
}

export function clampVolume(volume: number): number {
  return Math.min(VOLUME_MAX, Math.max(VOLUME_MIN, Math.round(volume)));
}

/** Resulting volume of applying an operator to the current volume, clamped. */
export function applyVolumeOperator(operator: VolumeOperator, current: number, amount: number): number {
  switch (operator) {
    case '=':
      return clampVolume(amount);
    case '+':
      return clampVolume(current + amount);
    case '-':
      return clampVolume(current - amount);
  }
}

/** Joins topic levels, skipping empty ones. */
export function joinTopic(...levels: string[]): string {
  return levels.filter((level) => level.length > 0).join('/');
}

/**
 * Returns the part of `topic` below `prefix`, or undefined when the topic lies elsewhere.
 */
export function topicSuffix(prefix: string, topic: string): string | undefined {
  const base = prefix ? `${prefix}/` : '';
  if (!topic.startsWith(base)) return undefined;
  const suffix = topic.slice(base.length);
  return suffix.length > 0 ? suffix : undefined;
}
