/**
 * Sounds: Pushover Notification Sound Vocabulary
 *
 * The fixed set of sound names the Pushover API accepts. Anything else is
 * dropped from outgoing messages rather than forwarded.
 */

export const SOUNDS = Object.freeze([
    'pushover', 'bike', 'bugle', 'cashregister', 'classical', 'cosmic',
    'falling', 'gamelan', 'incoming', 'intermission', 'magic', 'mechanical',
    'pianobar', 'siren', 'spacealarm', 'tugboat', 'alien', 'climb',
    'persistent', 'echo', 'updown', 'vibrate', 'none',
] as const);

export type Sound = typeof SOUNDS[number];

/** Default sound for urgent notifications. */
export const URGENT_SOUND: Sound = 'siren';

const SOUND_SET = new Set<string>(SOUNDS);

export function isSound(value: unknown): value is Sound {
    return typeof value === 'string' && SOUND_SET.has(value);
}
