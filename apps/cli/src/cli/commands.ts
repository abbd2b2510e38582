/**
 * Command handlers
 *
 * Each handler writes its report through `out` and resolves to an exit code.
 * Diagnostics go through the context logger instead.
 */

import {
  buildAuthorizeUrl,
  type CatalogClient,
  exchangeAuthorizationCode,
  extractAuthorizationCode,
  type OAuthCredentials,
  type TokenStore,
} from '@tracktap/catalog-client'
import {type AppConfig, AppConfigSchema, type MutationEntry, type SpotifyTrack} from '@tracktap/shared-types'

import {redactConfig} from '../config/ConfigStore'
import {upsertGenreGroup} from '../config/genre-groups'
import {OAUTH_SCOPES} from '../constants'
import {toPlaylistShareUrl} from '../lib/identifiers'
import {summarizePlaylistAudio} from '../services/AudioSummary'
import {curatePlaylist} from '../services/CurationOrchestrator'
import {collectOldFavorites, recentlyPlayed, suggestGenres, topTracks} from '../services/ListeningHistory'
import {LockRegistry} from '../services/LockRegistry'
import {copyPlaylist} from '../services/PlaylistCopier'
import {getPlaylistShareUrl, listOwnedPlaylists, resolvePlaylist, searchPlaylists} from '../services/PlaylistDirectory'
import {generatePlaylistQr} from '../services/QrCodeService'
import {addSongs} from '../services/TrackAdder'
import {type CliCommand, USAGE} from './parseArguments'

export const EXIT_CODES = {
  FAILURE: 1,
  OK: 0,
  USAGE: 2,
} as const

export interface ConfigRepository {
  load(): Promise<AppConfig | null>
  readonly path: string
  save(config: AppConfig): Promise<void>
}

export interface CommandContext {
  configStore: ConfigRepository
  createCatalog: (config: AppConfig) => CatalogClient
  out: (line: string) => void
  prompt: (question: string) => Promise<string>
  tokenStore: TokenStore
}

// ===== Formatting =====

function formatEntry(entry: MutationEntry): string {
  if (entry.success) {
    return `  added to ${entry.target}`
  }
  if (entry.reason === 'locked') {
    return `  skipped ${entry.target} (locked)`
  }
  if (entry.reason === 'not-found') {
    return `  skipped ${entry.target} (playlist not found)`
  }
  return `  failed ${entry.target}: ${entry.error ?? 'unknown error'}`
}

function formatTrack(track: SpotifyTrack): string {
  return `${track.name} - ${track.artists.map(artist => artist.name).join(', ')}`
}

function printNumbered(out: (line: string) => void, lines: readonly string[]): void {
  lines.forEach((line, index) => out(`  ${String(index + 1).padStart(2)}. ${line}`))
}

function toCredentials(config: AppConfig): OAuthCredentials {
  return {clientId: config.client_id, clientSecret: config.client_secret, redirectUri: config.redirect_uri}
}

// ===== Dispatch =====

export async function runCommand(command: CliCommand, context: CommandContext): Promise<number> {
  const {out} = context

  if (command.command === 'help') {
    out(USAGE)
    return EXIT_CODES.OK
  }

  const loaded = await context.configStore.load()

  if (command.command === 'setup-group') {
    const config = loaded ?? AppConfigSchema.parse({})
    upsertGenreGroup(config, command.genre, {playlists: command.playlists, save_to_liked: command.liked})
    await context.configStore.save(config)
    out(
      `Genre group "${command.genre}" saved: ${command.playlists.length} playlist(s)` +
        (command.liked ? ' + liked songs' : ''),
    )
    return EXIT_CODES.OK
  }

  if (!loaded) {
    out(`No configuration found at ${context.configStore.path}. Create it with client_id, client_secret and genres.`)
    return EXIT_CODES.FAILURE
  }
  const config = loaded

  switch (command.command) {
    case 'config': {
      out(JSON.stringify(redactConfig(config), null, 2))
      return EXIT_CODES.OK
    }

    case 'authorize': {
      if (!config.client_id || !config.client_secret) {
        out('client_id and client_secret must be set before authorizing')
        return EXIT_CODES.FAILURE
      }
      const credentials = toCredentials(config)
      out(`Open this URL and approve access:\n${buildAuthorizeUrl(credentials, OAUTH_SCOPES)}`)
      const code = extractAuthorizationCode(await context.prompt('Paste the redirected URL: '))
      if (!code) {
        out('No authorization code found')
        return EXIT_CODES.FAILURE
      }
      await context.tokenStore.save(await exchangeAuthorizationCode(credentials, code))
      out('Authorized; token cached')
      return EXIT_CODES.OK
    }

    case 'locks': {
      const locks = new LockRegistry(config).list()
      if (locks.length === 0) {
        out('No locked playlists')
        return EXIT_CODES.OK
      }
      out('Locked playlists:')
      printNumbered(
        out,
        locks.map(lock => `${lock.name} (${lock.id})`),
      )
      return EXIT_CODES.OK
    }

    default:
      return runCatalogCommand(command, config, context)
  }
}

async function runCatalogCommand(command: CliCommand, config: AppConfig, context: CommandContext): Promise<number> {
  const {out} = context
  const catalog = context.createCatalog(config)

  switch (command.command) {
    case 'add': {
      const outcome = await addSongs(catalog, config, command.refs, {
        force: command.force,
        genre: command.genre,
        locks: new LockRegistry(config),
      })
      if (!outcome.ok) {
        out(`Cannot add songs: ${outcome.error}`)
        return EXIT_CODES.FAILURE
      }
      for (const addition of outcome.additions) {
        out(addition.trackId === null ? `${addition.input}: not a track reference` : `${addition.input}:`)
        addition.result.forEach(entry => out(formatEntry(entry)))
      }
      out(`${outcome.processed}/${outcome.total} song(s) processed with at least one successful addition`)
      return outcome.processed > 0 ? EXIT_CODES.OK : EXIT_CODES.FAILURE
    }

    case 'bpm': {
      const playlist = await resolvePlaylist(catalog, command.playlist)
      if (!playlist) {
        out(`Playlist "${command.playlist}" not found`)
        return EXIT_CODES.FAILURE
      }
      const summary = await summarizePlaylistAudio(catalog, playlist.id)
      if (!summary) {
        out(`Could not read "${playlist.name}"`)
        return EXIT_CODES.FAILURE
      }
      out(`${playlist.name}: ${summary.tracks.length} track(s)`)
      if (summary.averageBpm !== null && summary.minBpm !== null && summary.maxBpm !== null) {
        out(
          `BPM: average ${summary.averageBpm.toFixed(1)}, min ${summary.minBpm.toFixed(1)}, max ${summary.maxBpm.toFixed(1)}`,
        )
      }
      const keys = Object.entries(summary.keyDistribution).sort((a, b) => b[1] - a[1])
      if (keys.length > 0) {
        out(`Keys: ${keys.map(([key, count]) => `${key} x${count}`).join(', ')}`)
      }
      printNumbered(
        out,
        summary.tracks.map(
          track =>
            `${track.name} - ${track.artist}: ${track.tempo === null ? '?' : track.tempo.toFixed(1)} BPM, ` +
            `${track.standardKey} (${track.camelotKey})`,
        ),
      )
      return EXIT_CODES.OK
    }

    case 'copy': {
      const result = await copyPlaylist(catalog, command.source, command.name)
      if (result.status === 'failed') {
        out(`Copy failed: ${result.reason}`)
        return EXIT_CODES.FAILURE
      }
      out(`Copied ${result.added}/${result.total} track(s) to "${command.name}": ${toPlaylistShareUrl(result.playlistId)}`)
      return EXIT_CODES.OK
    }

    case 'curate': {
      const result = await curatePlaylist(catalog, command.source, {newName: command.name, progress: out})
      return result.status === 'done' ? EXIT_CODES.OK : EXIT_CODES.FAILURE
    }

    case 'genres': {
      const genres = await suggestGenres(catalog, command.range, command.limit)
      if (!genres) {
        out('Could not read your top artists')
        return EXIT_CODES.FAILURE
      }
      out(`Genres from your top artists (${command.range}):`)
      printNumbered(out, genres)
      return EXIT_CODES.OK
    }

    case 'list': {
      const owned = await listOwnedPlaylists(catalog)
      if (!owned.complete) {
        out('Could not list your playlists')
        return EXIT_CODES.FAILURE
      }
      const matches = searchPlaylists(owned.items, command.term)
      out(command.term ? `Playlists matching "${command.term}":` : 'Your playlists:')
      printNumbered(
        out,
        matches.map(playlist => playlist.name),
      )
      out(`Total: ${matches.length} playlist(s)`)
      return EXIT_CODES.OK
    }

    case 'lock':
    case 'unlock': {
      const playlist = await resolvePlaylist(catalog, command.playlist)
      if (!playlist) {
        out(`Playlist "${command.playlist}" not found`)
        return EXIT_CODES.FAILURE
      }
      const registry = new LockRegistry(config)
      const changed = command.command === 'lock' ? registry.lock(playlist.id, playlist.name) : registry.unlock(playlist.id)
      if (!changed) {
        out(`"${playlist.name}" is already ${command.command === 'lock' ? 'locked' : 'unlocked'}`)
        return EXIT_CODES.OK
      }
      await context.configStore.save(config)
      out(`"${playlist.name}" ${command.command === 'lock' ? 'locked' : 'unlocked'}`)
      return EXIT_CODES.OK
    }

    case 'old-favorites': {
      const favorites = await collectOldFavorites(catalog, command.count)
      if (!favorites) {
        out('Could not read your listening history')
        return EXIT_CODES.FAILURE
      }
      out('Long-term favorites missing from recent listening:')
      printNumbered(out, favorites.map(formatTrack))
      return EXIT_CODES.OK
    }

    case 'qr': {
      const result = await generatePlaylistQr(catalog, command.target, command.out)
      if (result.status === 'failed') {
        out(`QR code not written: ${result.reason}`)
        return EXIT_CODES.FAILURE
      }
      out(`QR code for ${result.url} written to ${result.file}`)
      return EXIT_CODES.OK
    }

    case 'recent':
    case 'top': {
      const walk =
        command.command === 'top'
          ? await topTracks(catalog, command.range, command.limit)
          : await recentlyPlayed(catalog, command.limit)
      if (!walk.complete) {
        out('Could not read your listening history')
        return EXIT_CODES.FAILURE
      }
      out(command.command === 'top' ? `Top tracks (${command.range}):` : 'Recently played:')
      printNumbered(out, walk.items.map(formatTrack))
      return EXIT_CODES.OK
    }

    case 'url': {
      const url = await getPlaylistShareUrl(catalog, command.name)
      if (!url) {
        out(`Playlist "${command.name}" not found`)
        return EXIT_CODES.FAILURE
      }
      out(url)
      return EXIT_CODES.OK
    }

    default:
      out(USAGE)
      return EXIT_CODES.USAGE
  }
}
