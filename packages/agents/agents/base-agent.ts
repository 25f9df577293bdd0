// Base agent: owns the collaborators one role needs and the shared
// "generate non-empty text" contract. Each concrete agent builds its prompts
// and post-processes answers; bookkeeping is the step runner's job.

import { randomUUID } from 'node:crypto';
import type { GenerationProvider, SearchProvider } from '../types/collaborators.js';
import { GenerationError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const AGENT_TYPES = [
  'researcher',
  'analyst',
  'report-writer',
  'comparison-analyst',
  'chart-designer',
] as const;

export type AgentType = typeof AGENT_TYPES[number];

export interface AgentDeps {
  search: SearchProvider;
  generator: GenerationProvider;
  logger?: Logger;
}

export abstract class BaseAgent {
  readonly agentId: string;
  readonly agentType: AgentType;
  protected readonly search: SearchProvider;
  protected readonly generator: GenerationProvider;
  protected readonly log: Logger;

  constructor(agentType: AgentType, deps: AgentDeps) {
    this.agentId = randomUUID();
    this.agentType = agentType;
    this.search = deps.search;
    this.generator = deps.generator;
    this.log = deps.logger ?? createLogger(`Agent:${agentType}`);
  }

  protected async generate(prompt: string): Promise<string> {
    const text = await this.generator.generate(prompt);
    if (!text.trim()) {
      throw new GenerationError(`Empty response from generation service (${this.agentType})`);
    }
    return text.trim();
  }
}
