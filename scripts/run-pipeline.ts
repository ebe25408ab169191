/**
 * Runs the article pipeline once.
 *
 * Run with: npx tsx scripts/run-pipeline.ts "<brief>"
 *
 * Reads .env for provider credentials and PIPELINE_* overrides. Publishes to
 * CMS_ENDPOINT when CMS_ENDPOINT and CMS_API_TOKEN are both set, otherwise
 * writes markdown under the configured posts directory.
 */

import { config as loadEnv } from 'dotenv';
loadEnv();

import { generateObject } from 'ai';

import { createGenerationOracle, resolveProviderSettings } from '../src/ai/oracle';
import {
  CmsPublisher,
  describeQuarantineRef,
  FilePublisher,
  FileQuarantineStore,
  FileSessionStore,
  isPipelineRunError,
  loadPipelineConfigFromEnv,
  StageOrchestrator,
  type ArticlePublisher,
  type PipelineConfig,
} from '../src/ai/articles';
import { createPrefixedLogger } from '../src/utils/logger';

const log = createPrefixedLogger('[run-pipeline]');

function createPublisher(config: PipelineConfig): ArticlePublisher {
  const endpoint = process.env.CMS_ENDPOINT;
  const apiToken = process.env.CMS_API_TOKEN;
  if (endpoint && apiToken) {
    log.info(`Publishing to CMS at ${endpoint}`);
    return new CmsPublisher({ endpoint, apiToken, logger: log });
  }
  log.info(`Publishing to ${config.paths.postsDir}`);
  return new FilePublisher({ postsDir: config.paths.postsDir, logger: log });
}

async function main(): Promise<number> {
  const brief = process.argv.slice(2).join(' ').trim();
  if (!brief) {
    console.error('Usage: npx tsx scripts/run-pipeline.ts "<brief>"');
    return 2;
  }

  const config = loadPipelineConfigFromEnv();
  const oracle = createGenerationOracle(resolveProviderSettings(), {
    generateObject,
    timeoutMs: config.oracle.timeoutMs,
  });

  const orchestrator = new StageOrchestrator({
    oracle,
    config,
    sessionStore: new FileSessionStore(config.paths.sessionsDir),
    quarantineStore: new FileQuarantineStore(config.paths.quarantineDir),
    publisher: createPublisher(config),
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.warn('Interrupted, stopping after the current stage');
    controller.abort();
  });

  try {
    const outcome = await orchestrator.run(
      { brief },
      {
        signal: controller.signal,
        onProgress: (stage, progress, message) => log.info(`[${stage}] ${progress}%${message ? `: ${message}` : ''}`),
      }
    );

    if (outcome.consensusReport) {
      console.log(`\n${outcome.consensusReport}`);
    }

    if (outcome.status === 'published') {
      console.log(`✅ Published: ${outcome.receipt.location}`);
      return 0;
    }

    console.log(`⚠️  Quarantined: ${describeQuarantineRef(outcome.quarantine)}`);
    console.log(`   Report: ${outcome.quarantine.reportPath}`);
    return 1;
  } catch (error) {
    if (isPipelineRunError(error)) {
      console.error(`❌ ${error.code}: ${error.message}`);
      console.error(`   Last completed stage: ${error.lastCompletedStage ?? 'none'}`);
      if (error.quarantine) {
        console.error(`   Quarantined: ${describeQuarantineRef(error.quarantine)}`);
      }
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
