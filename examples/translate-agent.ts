/**
 * Translate Agent Example
 *
 * This example demonstrates how to:
 * 1. Load configuration from the environment (and an optional .env file)
 * 2. Build a translator over the OASF taxonomy catalog
 * 3. Translate a registry entry into an AgentFacts record and validate it
 * 4. Export the same agent as an OASF directory record
 *
 * Set OASF_SCHEMA_DIR to a checkout of the OASF schema catalog to enable
 * taxonomy matching.
 */

import 'dotenv/config';
import { consoleLogger, createRecordTranslator, loadBridgeConfig } from '../src/index';

function main() {
  const config = loadBridgeConfig();
  const { translator, warnings } = createRecordTranslator(config, { logger: consoleLogger });
  if (warnings.length > 0) {
    console.log(`Taxonomy loaded with ${warnings.length} warning(s)`);
  }

  const entry = {
    id: 'agent-123',
    label: 'Research Assistant',
    capabilities: ['chat', 'search', 'image tagging'],
    endpoints: ['https://api.example.com/v1/invoke'],
  };

  // 1. Registry entry -> AgentFacts
  const { record, validation } = translator.translateAndValidate(entry);
  console.log('AgentFacts record:');
  console.log(JSON.stringify(record, null, 2));
  if (validation.valid) {
    console.log('Record is valid');
  } else {
    for (const error of validation.errors) {
      console.log(`  ${error.path.join('.') || '<root>'}: ${error.message}`);
    }
  }

  // 2. AgentFacts -> registry entry (lossy)
  console.log('\nRound trip:', translator.toRegistryEntry(record));

  // 3. Registry agent -> OASF record
  const oasf = translator.toOASFRecord({
    agent_id: 'research-assistant:v1.0.0',
    agent_url: 'https://bridge.example.com/research-assistant',
    api_url: 'cmd://npx?args=research-assistant --stdio',
    capabilities: entry.capabilities,
  });
  console.log('\nOASF record:');
  console.log(JSON.stringify(oasf, null, 2));
}

main();
