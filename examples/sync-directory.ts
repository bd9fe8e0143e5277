/**
 * Directory Sync Example
 *
 * Plans a two-way sync between an OASF directory and a Nanda registry and
 * resolves federated identifiers through in-memory directories. Nothing is
 * written or posted: the plans are printed.
 */

import 'dotenv/config';
import {
  FederationRouter,
  NandaRegistryAdapter,
  OasfDirectoryAdapter,
  consoleLogger,
  createRecordTranslator,
  loadBridgeConfig,
  planDirectorySync,
  planRegistryExport,
} from '../src/index';

const oasfDirectory: Record<string, unknown> = {
  'doc-summarizer': {
    name: 'doc-summarizer',
    version: 'v2.1.0',
    description: 'Summarizes long documents',
    skills: [{ name: 'natural_language_processing/natural_language_generation/text_completion' }],
    locators: [
      { type: 'source-code', url: 'https://git.example.com/doc-summarizer' },
      { type: 'api-url', url: 'https://api.example.com/doc-summarizer' },
    ],
  },
};

const nandaRegistry: Record<string, unknown> = {
  'vision-bot': {
    agent_id: 'vision-bot',
    capabilities: ['vision'],
    agent_url: 'https://bridge.example.com/vision-bot',
  },
};

async function main() {
  const config = loadBridgeConfig();
  const { translator } = createRecordTranslator(config, { logger: consoleLogger });

  // 1. OASF -> Nanda registrations
  const syncPlan = planDirectorySync(Object.values(oasfDirectory), { logger: consoleLogger });
  console.log('Registrations to post:', syncPlan.payloads);

  // 2. Nanda -> OASF record files
  const exportPlan = planRegistryExport(Object.values(nandaRegistry), {
    matcher: translator.matcher,
    logger: consoleLogger,
  });
  for (const file of exportPlan.files) {
    console.log(`Would write ${file.fileName}`);
  }

  // 3. Federated lookups
  const router = new FederationRouter({ logger: consoleLogger });
  router.registerAdapter(
    new OasfDirectoryAdapter({
      id: config.registryId,
      matcher: translator.matcher,
      fetchRecord: async (name) => oasfDirectory[name] ?? null,
    })
  );
  router.registerAdapter(
    new NandaRegistryAdapter({
      matcher: translator.matcher,
      fetchRecord: async (name) => nandaRegistry[name] ?? null,
    })
  );

  console.log('\nRegistries:', router.listRegistries());
  console.log(await router.lookup(`@${config.registryId}:doc-summarizer`));
  console.log(await router.lookup('vision-bot'));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
