/**
 * MoodGenreAnalyzer Tests
 */

import {describe, expect, it} from 'vitest'

import {
  aggregateAnalysis,
  analyzeTracks,
  averageFeatures,
  emptyAnalysis,
  isAnalysisUnavailable,
  rankGenres,
} from '../../services/MoodGenreAnalyzer'
import {FakeCatalogClient} from '../fixtures/FakeCatalogClient'
import {buildArtist, buildFeatures, buildTrack, buildTrackDetail} from '../fixtures/test-builders'

describe('averageFeatures', () => {
  it('averages over tracks that supplied a value', () => {
    const averages = averageFeatures([
      buildTrackDetail('t1', {audioFeatures: {energy: 0.25, tempo: 120}}),
      buildTrackDetail('t2', {audioFeatures: {energy: 0.75, tempo: null}}),
      buildTrackDetail('t3'),
    ])

    expect(averages.energy).toBe(0.5)
    expect(averages.tempo).toBe(120)
  })

  it('yields null for a feature no track supplied', () => {
    const averages = averageFeatures([buildTrackDetail('t1', {audioFeatures: {energy: 0.5}})])

    expect(averages.valence).toBeNull()
    expect(averages.danceability).toBeNull()
  })

  it('does not depend on input order', () => {
    const details = [
      buildTrackDetail('t1', {audioFeatures: {danceability: 0.125, energy: 0.25}}),
      buildTrackDetail('t2', {audioFeatures: {danceability: 0.5, energy: 0.75}}),
      buildTrackDetail('t3', {audioFeatures: {danceability: 0.375, energy: 1}}),
    ]

    expect(averageFeatures([...details].reverse())).toEqual(averageFeatures(details))
  })
})

describe('rankGenres', () => {
  it('orders by frequency and keeps first-seen order on ties', () => {
    const details = [
      buildTrackDetail('t1', {genres: ['jazz', 'rock']}),
      buildTrackDetail('t2', {genres: ['pop', 'rock']}),
      buildTrackDetail('t3', {genres: ['pop']}),
    ]

    expect(rankGenres(details)).toEqual(['rock', 'pop', 'jazz'])
  })

  it('keeps at most the limit', () => {
    const details = [buildTrackDetail('t1', {genres: ['a', 'b', 'c', 'd', 'e', 'f']})]

    expect(rankGenres(details)).toEqual(['a', 'b', 'c', 'd', 'e'])
  })
})

describe('aggregateAnalysis', () => {
  it('returns the sentinel for no details', () => {
    const analysis = aggregateAnalysis([], ['t1'])

    expect(analysis).toEqual(emptyAnalysis())
    expect(isAnalysisUnavailable(analysis)).toBe(true)
  })

  it('keeps the first five input ids as seeds', () => {
    const analysis = aggregateAnalysis([buildTrackDetail('t1')], ['t1', 't2', 't3', 't4', 't5', 't6'])

    expect(analysis.seedTrackIds).toEqual(['t1', 't2', 't3', 't4', 't5'])
    expect(isAnalysisUnavailable(analysis)).toBe(false)
  })
})

describe('analyzeTracks', () => {
  it('returns the sentinel for an empty input without remote calls', async () => {
    const catalog = new FakeCatalogClient()

    expect(await analyzeTracks(catalog, [])).toEqual(emptyAnalysis())
    expect(catalog.calls).toEqual([])
  })

  it('combines features and artist genres, skipping unresolvable tracks', async () => {
    const catalog = new FakeCatalogClient().withTracks(
      buildTrack('t1', {artists: [{id: 'a1', name: 'A1'}]}),
      buildTrack('t2', {artists: [{id: 'a2', name: 'A2'}]}),
    )
    catalog.artists.set('a1', buildArtist('a1', ['rock', 'pop']))
    catalog.artists.set('a2', buildArtist('a2', ['pop']))
    catalog.audioFeatures.set('t1', buildFeatures('t1', {energy: 0.5}))

    const analysis = await analyzeTracks(catalog, ['t1', 't2', 'missing'])

    expect(analysis.topGenres).toEqual(['pop', 'rock'])
    expect(analysis.featureAverages.energy).toBe(0.5)
    expect(analysis.seedTrackIds).toEqual(['t1', 't2', 'missing'])
  })

  it('looks each artist up once per run', async () => {
    const catalog = new FakeCatalogClient().withTracks(
      buildTrack('t1', {artists: [{id: 'a1', name: 'A1'}]}),
      buildTrack('t2', {artists: [{id: 'a1', name: 'A1'}]}),
    )
    catalog.artists.set('a1', buildArtist('a1', ['house']))

    await analyzeTracks(catalog, ['t1', 't2'])

    expect(catalog.callCount('getArtist')).toBe(1)
  })

  it('returns the sentinel when no track resolves', async () => {
    const catalog = new FakeCatalogClient()

    const analysis = await analyzeTracks(catalog, ['gone-1', 'gone-2'])

    expect(isAnalysisUnavailable(analysis)).toBe(true)
  })

  it('keeps tracks whose audio features lookup failed', async () => {
    const catalog = new FakeCatalogClient()
      .withTracks(buildTrack('t1', {artists: [{id: 'a1', name: 'A1'}]}))
      .failOn('getAudioFeatures')
    catalog.artists.set('a1', buildArtist('a1', ['ambient']))

    const analysis = await analyzeTracks(catalog, ['t1'])

    expect(analysis.topGenres).toEqual(['ambient'])
    expect(analysis.featureAverages.energy).toBeNull()
  })
})
