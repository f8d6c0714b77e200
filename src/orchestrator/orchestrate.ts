/**
 * Main Orchestrator
 *
 * The entry point callers use to process one outreach task:
 * 1. Deliberate: produce a plan with no tools attached
 * 2. Execute: carry out the plan with tool access
 * 3. Return exactly one of status or error
 *
 * Each run owns a fresh ConversationState. Nothing is shared across runs
 * except the injected collaborators.
 */

import type Anthropic from '@anthropic-ai/sdk';

import config from '../config.js';
import { getClient } from '../services/anthropic/client.js';
import { createGmailTransport } from '../domains/outreach/providers/gmail.js';
import { DraftComposer } from '../domains/outreach/service/composer.js';
import { failed, systemClock } from '../domains/outreach/types.js';
import type { Clock, DraftTransport, ExecutionResult } from '../domains/outreach/types.js';
import { DeliberationError } from '../domains/outreach/errors.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, withRunContext } from '../utils/observability/index.js';
import type { AppLogger } from '../utils/observability/index.js';
import { deliberate } from './deliberation.js';
import { execute } from './execution.js';
import { AGENT_DEFAULTS, createConversationState } from './types.js';
import type { PhaseDependencies } from './types.js';

export interface OutreachAgentOptions {
  client: Anthropic;
  transport: DraftTransport;
  clock?: Clock;
  logger?: AppLogger;
  labelBase?: string;
  sender?: string;
  attachmentsBaseDir?: string;
  models?: {
    planner?: string;
    agent?: string;
  };
  maxExecutionTurns?: number;
  maxTokens?: number;
}

export class OutreachAgent {
  private readonly deps: PhaseDependencies;

  constructor(options: OutreachAgentOptions) {
    const logger = options.logger ?? createLogger({ domain: 'outreach-agent' });

    this.deps = {
      client: options.client,
      composer: new DraftComposer({
        transport: options.transport,
        clock: options.clock ?? systemClock,
        labelBase: options.labelBase ?? config.outreach.labelBase,
        sender: options.sender,
        attachmentsBaseDir: options.attachmentsBaseDir,
        logger: logger.child({ operation: 'compose' }),
      }),
      logger,
      models: {
        planner: options.models?.planner ?? config.models.planner,
        agent: options.models?.agent ?? config.models.agent,
      },
      maxExecutionTurns: options.maxExecutionTurns ?? AGENT_DEFAULTS.maxExecutionTurns,
      maxTokens: options.maxTokens ?? AGENT_DEFAULTS.maxTokens,
    };
  }

  /**
   * Deliberate, then execute, exactly once.
   *
   * Never throws for an expected failure: deliberation and execution
   * errors come back as `{ status: null, error }`.
   */
  async run(taskPrompt: string): Promise<ExecutionResult> {
    return withRunContext('runId', () => this.runInContext(taskPrompt));
  }

  private async runInContext(taskPrompt: string): Promise<ExecutionResult> {
    const { logger } = this.deps;
    const startTime = Date.now();

    if (!taskPrompt.trim()) {
      logger.warn('run_rejected', { reason: 'empty_task' });
      return failed('Task prompt is empty.');
    }

    const state = createConversationState(taskPrompt);
    logger.info('run_started', { taskPrompt });

    let result: ExecutionResult;
    try {
      const plan = await deliberate(taskPrompt, state, this.deps);
      result = await execute(plan, state, this.deps);
    } catch (error) {
      if (!(error instanceof DeliberationError)) {
        throw error;
      }
      result = failed(errorMessage(error));
    }

    logger.info('run_finished', {
      success: result.error === null,
      error: result.error ?? undefined,
      draftCount: state.drafts.length,
      toolCallCount: state.toolCalls.length,
      inputTokens: state.usage.inputTokens,
      outputTokens: state.usage.outputTokens,
      durationMs: Date.now() - startTime,
    });

    return result;
  }
}

/**
 * Agent wired with the production collaborators from config: the shared
 * Anthropic client and a Gmail draft transport.
 */
export function createOutreachAgent(logger?: AppLogger): OutreachAgent {
  const agentLogger = logger ?? createLogger({ domain: 'outreach-agent' });
  return new OutreachAgent({
    client: getClient(),
    transport: createGmailTransport(agentLogger.child({ operation: 'gmail' })),
    clock: systemClock,
    logger: agentLogger,
    labelBase: config.outreach.labelBase,
    sender: config.google.sender,
    attachmentsBaseDir: config.outreach.attachmentsBaseDir,
    models: config.models,
    maxExecutionTurns: config.agent.maxExecutionTurns,
    maxTokens: config.agent.maxTokens,
  });
}
