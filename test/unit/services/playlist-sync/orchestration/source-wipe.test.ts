import { RemoteWriteError } from '@services/playlist-sync/errors.js'
import { wipeCollection } from '@services/playlist-sync/orchestration/index.js'
import { describe, expect, it } from 'vitest'
import { makeTrack } from '../../../../fixtures/tracks.js'
import { FakeCatalog } from '../../../../mocks/fake-catalog.js'
import { createMockLogger } from '../../../../mocks/logger.js'

function deps(catalog: FakeCatalog, protectedId = 'stock') {
  return {
    catalog,
    logger: createMockLogger(),
    isProtected: (id: string) => id === protectedId,
  }
}

describe('wipeCollection', () => {
  it('should remove every track in chunks of 100', async () => {
    const tracks = Array.from({ length: 230 }, (_, i) => makeTrack(`t${i}`))
    const catalog = new FakeCatalog().addPlaylist('reference', tracks)

    const removed = await wipeCollection('reference', tracks, deps(catalog))

    expect(removed).toBe(230)
    expect(
      catalog.callsTo('removePlaylistItems').map((c) => c.ids.length),
    ).toEqual([100, 100, 30])
    expect(catalog.playlists.get('reference')).toEqual([])
  })

  it('should send each track once and skip local files', async () => {
    const tracks = [
      makeTrack('t1'),
      makeTrack('t1'),
      makeTrack('spotify:local:a:b:c:1', { isLocal: true }),
      makeTrack('t2'),
    ]
    const catalog = new FakeCatalog().addPlaylist('reference', tracks)

    const removed = await wipeCollection('reference', tracks, deps(catalog))

    expect(removed).toBe(2)
    expect(catalog.callsTo('removePlaylistItems')[0].ids).toEqual(['t1', 't2'])
  })

  it('should remove relinked tracks by the ID the playlist stores', async () => {
    const tracks = [
      makeTrack('playable', { linkedFromId: 'stored' }),
      makeTrack('t2'),
    ]
    const catalog = new FakeCatalog().addPlaylist('reference', tracks)

    await wipeCollection('reference', tracks, deps(catalog))

    expect(catalog.callsTo('removePlaylistItems')[0].ids).toEqual([
      'stored',
      't2',
    ])
  })

  it('should refuse to wipe a protected playlist', async () => {
    const tracks = [makeTrack('t1')]
    const catalog = new FakeCatalog().addPlaylist('stock', tracks)
    const wipeDeps = deps(catalog)

    const removed = await wipeCollection('stock', tracks, wipeDeps)

    expect(removed).toBe(0)
    expect(catalog.writeCalls).toEqual([])
    expect(wipeDeps.logger.warn).toHaveBeenCalledWith(
      'Skipping wipe of protected playlist stock',
    )
  })

  it('should report the failed chunk', async () => {
    const tracks = Array.from({ length: 150 }, (_, i) => makeTrack(`t${i}`))
    const catalog = new FakeCatalog()
      .addPlaylist('reference', tracks)
      .failOn('removePlaylistItems', new Error('bad gateway'), 1)

    const error = await wipeCollection('reference', tracks, deps(catalog)).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(RemoteWriteError)
    expect(error).toMatchObject({ phase: 'WipingSource', chunkIndex: 1 })
    expect(catalog.playlists.get('reference')).toHaveLength(50)
  })
})
