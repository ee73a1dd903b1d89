import fp from 'fastify-plugin';
import { SqliteStore } from '../store/sqlite-store.js';
import { loadDirectorySeed } from '../store/seed.js';
import type { PipelineStore } from '../store/types.js';

export interface StorePluginOptions {
  path: string;
  directorySeedFile?: string;
  /** Pre-built store; the plugin still closes it on shutdown. */
  store?: PipelineStore;
}

export default fp<StorePluginOptions>(async (fastify, opts) => {
  const store = opts.store ?? new SqliteStore(opts.path);

  if (opts.directorySeedFile) {
    const counts = await loadDirectorySeed(store, opts.directorySeedFile);
    fastify.log.info(counts, `Directory seeded from ${opts.directorySeedFile}`);
  }

  fastify.decorate('store', store);

  fastify.addHook('onClose', async () => {
    await store.close();
  });
}, { name: 'store' });
