import { env } from './env.js';
import { createApp } from './app.js';
import { createServices } from './services/index.js';
import { createMemoryRepository } from './store/memoryRepository.js';
import type { HuntRepository } from './store/repository.js';
import { loadSeedFile } from './store/seed.js';
import { createSupabaseRepository } from './store/supabaseRepository.js';
import { createSupabaseClient } from './supabase.js';

async function createRepository(): Promise<HuntRepository> {
  if (env.DATA_STORE === 'memory') {
    const seed = env.SEED_FILE ? await loadSeedFile(env.SEED_FILE) : {};
    console.warn('Using the in-process store; data is lost on restart');
    return createMemoryRepository(seed);
  }
  return createSupabaseRepository(createSupabaseClient(env));
}

async function main() {
  const repository = await createRepository();
  const app = createApp(createServices(repository));

  app.listen(env.PORT, () => {
    console.log(`Server listening on port ${env.PORT}`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server', error);
  process.exit(1);
});
