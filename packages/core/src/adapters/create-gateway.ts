import type { Settings } from '../domain/settings/settings.js';
import type { KnowledgeGateway } from '../ports/knowledge-gateway.js';
import { DryRunGateway } from './dry-run-gateway.js';
import { OpenWebUIGateway } from './openwebui-gateway.js';

export function createGateway(settings: Settings): KnowledgeGateway {
  return settings.dryRun ? new DryRunGateway() : new OpenWebUIGateway(settings);
}
