import { RemoteFetchError } from '@services/playlist-sync/errors.js'
import { removeSavedTracks } from '@services/playlist-sync/orchestration/index.js'
import { describe, expect, it } from 'vitest'
import { makeTrack } from '../../../../fixtures/tracks.js'
import { FakeCatalog } from '../../../../mocks/fake-catalog.js'
import { createMockLogger } from '../../../../mocks/logger.js'

describe('removeSavedTracks', () => {
  it('should drop saved tracks and keep order', async () => {
    const tracks = ['a', 'b', 'c', 'd'].map((id) => makeTrack(id))
    const catalog = new FakeCatalog()
    catalog.saved.add('b')
    catalog.saved.add('d')

    const { kept, removed } = await removeSavedTracks(tracks, {
      catalog,
      logger: createMockLogger(),
    })

    expect(kept.map((t) => t.id)).toEqual(['a', 'c'])
    expect(removed.map((t) => t.id)).toEqual(['b', 'd'])
  })

  it('should check saved tracks in batches of 50', async () => {
    const tracks = Array.from({ length: 120 }, (_, i) => makeTrack(`t${i}`))
    const catalog = new FakeCatalog()

    await removeSavedTracks(tracks, { catalog, logger: createMockLogger() })

    expect(
      catalog.callsTo('containsSavedTracks').map((c) => c.ids.length),
    ).toEqual([50, 50, 20])
  })

  it('should fail the filtering phase when the check fails', async () => {
    const catalog = new FakeCatalog().failOn(
      'containsSavedTracks',
      new Error('unauthorized'),
    )

    await expect(
      removeSavedTracks([makeTrack('a')], {
        catalog,
        logger: createMockLogger(),
      }),
    ).rejects.toBeInstanceOf(RemoteFetchError)
  })
})
