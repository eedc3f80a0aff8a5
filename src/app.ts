/**
 * Wiring of the intake pipeline. Built once per Lambda container and reused
 * while the container stays warm.
 */

import { AppConfig, loadConfig, validateEnvironment } from './config';
import { BedrockModelClient, initBedrockClient } from './services/bedrock';
import { IntakeConductor } from './services/conductor';
import { DynamoDoctorDirectory } from './services/doctorDirectory';
import { initDocClient } from './services/dynamodb';
import { DoctorsInterpreter } from './services/interpreters/doctors';
import { TriageInterpreter } from './services/interpreters/triage';
import { WorkshopsInterpreter } from './services/interpreters/workshops';
import { KnowledgeBase, LambdaKnowledgeBase, emptyKnowledgeBase, initLambdaClient } from './services/knowledgeBase';
import { loadTriggerTable } from './services/riskEscalation';
import { DynamoSessionStore } from './services/sessionStore';
import { TurnRecorder } from './services/turnRecorder';
import { WorkshopCatalog } from './services/workshopCatalog';
import { logger } from './utils/logger';

export function buildConductor(config: AppConfig): IntakeConductor {
  const docClient = initDocClient(config.region);
  const model = new BedrockModelClient(initBedrockClient(config.bedrockRegion), {
    modelId: config.modelId,
    timeoutMs: config.extractionTimeoutMs,
  });

  const knowledgeBase: KnowledgeBase = config.ragLambdaArn
    ? new LambdaKnowledgeBase(initLambdaClient(config.region), config.ragLambdaArn, config.ragMaxResults)
    : emptyKnowledgeBase;

  const store = new DynamoSessionStore(docClient, config.sessionsTable);

  return new IntakeConductor({
    store,
    recorder: new TurnRecorder(store, {
      maxTurns: config.maxSessionTurns,
      ttlSeconds: config.sessionTtlSeconds,
    }),
    interpreters: {
      triage: new TriageInterpreter(model, { knowledgeBase, ragMaxResults: config.ragMaxResults }),
      doctors: new DoctorsInterpreter(model),
      workshops: new WorkshopsInterpreter(model),
    },
    triggers: loadTriggerTable(config.dangerTriggersPath),
    directory: new DynamoDoctorDirectory(docClient, {
      doctorsTable: config.doctorsTable,
      schedulesTable: config.schedulesTable,
    }),
    catalog: WorkshopCatalog.fromFile(config.workshopsCatalogPath),
    knowledgeBase,
    router: { model, modelId: config.routerModelId },
  });
}

// ─── Initialize once (warm Lambda) ──────────────────────────────────────────

let config: AppConfig | null = null;
let conductor: IntakeConductor | null = null;

export function getConfig(): AppConfig {
  if (config) return config;

  const validation = validateEnvironment();
  for (const warning of validation.warnings) {
    logger.warn('Configuration warning', {}, { warning });
  }
  for (const error of validation.errors) {
    logger.error('Configuration error', {}, { error });
  }

  config = loadConfig();
  return config;
}

export function getConductor(): IntakeConductor {
  if (!conductor) {
    conductor = buildConductor(getConfig());
    logger.info('Intake pipeline initialized', {}, { environment: getConfig().environment });
  }
  return conductor;
}
