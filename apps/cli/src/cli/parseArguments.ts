/**
 * Command-line parsing
 *
 * argv is split into positionals and flags by hand, then validated with zod.
 */

import {formatZodError, safeParse} from '@tracktap/shared-types'
import {z} from 'zod'

import {DEFAULT_FILES, HISTORY} from '../constants'

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

// ===== Schemas =====

const TimeRangeSchema = z.enum(['short_term', 'medium_term', 'long_term'])
const CountSchema = z.coerce.number().int().positive()
const RequiredText = (label: string) => z.string({required_error: `${label} is required`}).min(1, `${label} is required`)

export const CliCommandSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('add'),
    force: z.boolean(),
    genre: z.string().optional(),
    refs: z.array(z.string()).min(1, 'at least one track reference is required'),
  }),
  z.object({command: z.literal('authorize')}),
  z.object({command: z.literal('bpm'), playlist: RequiredText('playlist')}),
  z.object({command: z.literal('config')}),
  z.object({command: z.literal('copy'), name: RequiredText('new playlist name'), source: RequiredText('source playlist')}),
  z.object({command: z.literal('curate'), name: z.string().min(1).optional(), source: RequiredText('source playlist')}),
  z.object({
    command: z.literal('genres'),
    limit: CountSchema.default(HISTORY.GENRE_SUGGESTIONS),
    range: TimeRangeSchema.default('medium_term'),
  }),
  z.object({command: z.literal('help')}),
  z.object({command: z.literal('list'), term: z.string().optional()}),
  z.object({command: z.literal('lock'), playlist: RequiredText('playlist')}),
  z.object({command: z.literal('locks')}),
  z.object({command: z.literal('old-favorites'), count: CountSchema.default(HISTORY.OLD_FAVORITES)}),
  z.object({command: z.literal('qr'), out: z.string().default(DEFAULT_FILES.QR_IMAGE), target: RequiredText('playlist')}),
  z.object({command: z.literal('recent'), limit: CountSchema.default(HISTORY.DEFAULT_LIMIT)}),
  z.object({
    command: z.literal('setup-group'),
    genre: RequiredText('genre'),
    liked: z.boolean(),
    playlists: z.array(z.string()),
  }),
  z.object({
    command: z.literal('top'),
    limit: CountSchema.default(HISTORY.DEFAULT_LIMIT),
    range: TimeRangeSchema.default('medium_term'),
  }),
  z.object({command: z.literal('unlock'), playlist: RequiredText('playlist')}),
  z.object({command: z.literal('url'), name: RequiredText('playlist name')}),
])

export type CliCommand = z.infer<typeof CliCommandSchema>

// ===== Tokenizing =====

const VALUE_FLAGS = new Set(['count', 'genre', 'limit', 'name', 'out', 'range'])
const SWITCH_FLAGS = new Set(['force', 'help', 'liked'])
const SHORT_FLAGS: Record<string, string> = {g: 'genre', h: 'help', n: 'name', o: 'out'}

interface Tokens {
  flags: Map<string, string | true>
  positionals: string[]
}

function tokenize(args: readonly string[]): Tokens {
  const flags = new Map<string, string | true>()
  const positionals: string[] = []

  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? ''
    if (arg === '--') {
      positionals.push(...args.slice(index + 1))
      break
    }
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg)
      continue
    }

    const [rawName = '', inlineValue] = arg.replace(/^--?/, '').split(/=(.*)/s, 2)
    const name = arg.startsWith('--') ? rawName : (SHORT_FLAGS[rawName] ?? rawName)

    if (SWITCH_FLAGS.has(name)) {
      flags.set(name, true)
    } else if (VALUE_FLAGS.has(name)) {
      const value = inlineValue ?? args[index + 1]
      if (value === undefined || (inlineValue === undefined && value.startsWith('-'))) {
        throw new CliUsageError(`--${name} needs a value`)
      }
      flags.set(name, value)
      if (inlineValue === undefined) {
        index++
      }
    } else {
      throw new CliUsageError(`Unknown option ${arg}`)
    }
  }

  return {flags, positionals}
}

function toRawCommand(command: string, {flags, positionals}: Tokens): Record<string, unknown> {
  const text = (name: string) => {
    const value = flags.get(name)
    return typeof value === 'string' ? value : undefined
  }
  const joined = positionals.join(' ') || undefined
  const [first, ...rest] = positionals

  switch (command) {
    case 'add':
      return {command, force: flags.has('force'), genre: text('genre'), refs: positionals}
    case 'bpm':
    case 'lock':
    case 'unlock':
      return {command, playlist: joined}
    case 'copy':
      return {command, name: rest.join(' ') || undefined, source: first}
    case 'curate':
      return {command, name: text('name'), source: first}
    case 'genres':
    case 'top':
      return {command, limit: text('limit'), range: text('range')}
    case 'list':
      return {command, term: joined}
    case 'old-favorites':
      return {command, count: text('count')}
    case 'qr':
      return {command, out: text('out'), target: joined}
    case 'recent':
      return {command, limit: text('limit')}
    case 'setup-group':
      return {command, genre: first, liked: flags.has('liked'), playlists: rest}
    case 'url':
      return {command, name: joined}
    default:
      return {command}
  }
}

export function parseArguments(argv: readonly string[]): CliCommand {
  const [command, ...args] = argv
  if (command === undefined || command === '--help' || command === '-h') {
    return {command: 'help'}
  }

  const tokens = tokenize(args)
  if (tokens.flags.has('help')) {
    return {command: 'help'}
  }

  const parsed = safeParse(CliCommandSchema, toRawCommand(command, tokens))
  if (!parsed.success) {
    const unknownCommand = parsed.error.errors.some(issue => issue.code === 'invalid_union_discriminator')
    throw new CliUsageError(
      unknownCommand ? `Unknown command "${command}"` : `${command}: ${formatZodError(parsed.error)}`,
    )
  }
  return parsed.data
}

export const USAGE = `Usage: tracktap <command> [options]

Commands:
  authorize                              Sign in and cache an access token
  add <track...> [-g genre] [--force]    Add tracks to a genre group's playlists
  copy <playlist> <new name>             Copy a playlist into a new one
  curate <playlist> [-n name]            Build a playlist from recommendations
  list [term]                            List your playlists, optionally filtered
  url <playlist name>                    Print a playlist's share link
  qr <playlist name|link> [-o file]      Write a QR code for a playlist
  lock <playlist> | unlock <playlist>    Protect a playlist from additions
  locks                                  List locked playlists
  bpm <playlist>                         Tempo and key summary
  top [--range r] [--limit n]            Your top tracks
  recent [--limit n]                     Recently played tracks
  old-favorites [--count n]              Long-term favorites you stopped playing
  genres [--range r] [--limit n]         Genres from your top artists
  setup-group <genre> <playlist...> [--liked]
                                         Create or replace a genre group
  config                                 Show the configuration
  help                                   Show this message

Ranges: short_term, medium_term, long_term
Environment: LOG_LEVEL, TRACKTAP_CONFIG, TRACKTAP_TOKEN_CACHE`
