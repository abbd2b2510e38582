/**
 * AudioKeyCodec - pitch class/mode to key names and Camelot wheel codes
 */

export const UNKNOWN_KEY = 'Unknown Key'
export const UNKNOWN_WHEEL_CODE = '-'

/** Sharps spelling, indexed by pitch class */
const PITCH_CLASSES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'] as const

/** Spellings that name a pitch class under another letter */
const ENHARMONIC_SPELLINGS: Record<string, string> = {
  Ab: 'G#',
  'B#': 'C',
  Bb: 'A#',
  Cb: 'B',
  Db: 'C#',
  'E#': 'F',
  Eb: 'D#',
  Fb: 'E',
  Gb: 'F#',
}

/** Wheel numbers; minor keys take the A suffix, major keys B */
const WHEEL_CODES: Record<string, string> = {
  'A Major': '11B',
  'A Minor': '8A',
  'A# Major': '6B',
  'A# Minor': '3A',
  'B Major': '1B',
  'B Minor': '10A',
  'C Major': '8B',
  'C Minor': '5A',
  'C# Major': '3B',
  'C# Minor': '12A',
  'D Major': '10B',
  'D Minor': '7A',
  'D# Major': '5B',
  'D# Minor': '2A',
  'E Major': '12B',
  'E Minor': '9A',
  'F Major': '7B',
  'F Minor': '4A',
  'F# Major': '2B',
  'F# Minor': '11A',
  'G Major': '9B',
  'G Minor': '6A',
  'G# Major': '4B',
  'G# Minor': '1A',
}

const KEY_NAME_PATTERN = /^([A-Ga-g])([#b]?)\s+(major|minor)$/i

export function pitchClassToKeyName(pitchClass: number, mode: number): string {
  const note = Number.isInteger(pitchClass) ? PITCH_CLASSES[pitchClass] : undefined
  if (note === undefined || (mode !== 0 && mode !== 1)) {
    return UNKNOWN_KEY
  }
  return `${note} ${mode === 1 ? 'Major' : 'Minor'}`
}

/**
 * Accepts sharp or flat spellings, e.g. "Db Major" and "C# Major" share a code
 */
export function keyNameToWheelCode(keyName: string): string {
  const match = KEY_NAME_PATTERN.exec(keyName.trim())
  if (!match?.[1] || match[3] === undefined) {
    return UNKNOWN_WHEEL_CODE
  }

  const spelled = `${match[1].toUpperCase()}${match[2] ?? ''}`
  const note = ENHARMONIC_SPELLINGS[spelled] ?? spelled
  const mode = match[3].toLowerCase() === 'major' ? 'Major' : 'Minor'
  return WHEEL_CODES[`${note} ${mode}`] ?? UNKNOWN_WHEEL_CODE
}

export function pitchClassToWheelCode(pitchClass: number, mode: number): string {
  return keyNameToWheelCode(pitchClassToKeyName(pitchClass, mode))
}
