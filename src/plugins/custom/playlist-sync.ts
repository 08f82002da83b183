/**
 * Playlist Sync Plugin
 *
 * Registers the PlaylistSyncService and, when `syncSchedule` is set, a cron
 * job that runs the configured reconciliation.
 */
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { AsyncTask, CronJob, ToadScheduler } from 'toad-scheduler'
import { PlaylistSyncService } from '@services/playlist-sync.service.js'
import { configuredRequest } from '@services/playlist-sync/request.js'

declare module 'fastify' {
  interface FastifyInstance {
    playlistSync: PlaylistSyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const service = new PlaylistSyncService(fastify.log, {
      catalog: fastify.spotify,
      blacklist: fastify.blacklist,
      config: {
        stockPlaylistId: config.stockPlaylistId,
        descriptionTemplate: config.descriptionTemplate,
        albumReadConcurrency: config.albumReadConcurrency,
      },
    })
    fastify.decorate('playlistSync', service)

    if (!config.syncSchedule) {
      return
    }

    const scheduler = new ToadScheduler()
    const task = new AsyncTask(
      'playlist-sync-task',
      async () => {
        fastify.log.debug('Running scheduled playlist sync')
        const result = await service.reconcile(configuredRequest(config))
        fastify.log.info(
          `Scheduled playlist sync wrote ${result.counts.written} tracks in ${result.counts.chunks} chunks`,
        )
      },
      (error) => {
        fastify.log.error({ error }, 'Scheduled playlist sync failed')
      },
    )

    fastify.addHook('onReady', async () => {
      scheduler.addCronJob(
        new CronJob({ cronExpression: config.syncSchedule }, task, {
          id: 'playlist-sync',
          preventOverrun: true,
        }),
      )
      fastify.log.info(`Playlist sync scheduled with "${config.syncSchedule}"`)
    })

    fastify.addHook('onClose', async () => {
      scheduler.stop()
    })
  },
  {
    name: 'playlist-sync',
    dependencies: ['config', 'spotify-api', 'blacklist'],
  },
)
