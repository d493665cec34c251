/**
 * Project Enhancer
 *
 * Optional LLM review of a finished ProjectOutput. The deterministic result is
 * always complete without it: every failure or timeout degrades to an
 * "unavailable" result and the base output is returned untouched.
 */

import OpenAI from 'openai';
import type { ProjectInput, ProjectOutput } from '../../shared/schema';
import { loggers, logError } from '../lib/logger';

const log = loggers.llm;

// ============================================
// TYPE DEFINITIONS
// ============================================

export type EnhancementResult =
  | { status: 'available'; text: string; model: string }
  | { status: 'unavailable'; reason: string };

export interface ProjectEnhancer {
  enhance(project: ProjectInput, output: ProjectOutput): Promise<EnhancementResult>;
}

export interface EnhancedProjectOutput {
  output: ProjectOutput;
  enhancement: EnhancementResult;
}

export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Minimal chat completion seam so the enhancer can run without network access
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<{ content: string | null; model: string }>;
}

// ============================================
// IMPLEMENTATIONS
// ============================================

/**
 * Default binding: never calls out, always unavailable
 */
export class NoopEnhancer implements ProjectEnhancer {
  async enhance(): Promise<EnhancementResult> {
    return { status: 'unavailable', reason: 'LLM enhancement is not configured' };
  }
}

export const SYSTEM_PROMPT =
  'You are an expert civil engineer specializing in erosion control ' +
  'and sediment management for roadway construction projects.';

export interface OpenAIEnhancerOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIEnhancer implements ProjectEnhancer {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly client: CompletionClient,
    private readonly options: OpenAIEnhancerOptions
  ) {
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 800;
  }

  async enhance(project: ProjectInput, output: ProjectOutput): Promise<EnhancementResult> {
    const completion = await this.client.complete({
      model: this.options.model,
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: buildEnhancementPrompt(project, output),
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });

    const text = completion.content?.trim();
    if (!text) {
      return { status: 'unavailable', reason: 'No response from AI' };
    }

    return { status: 'available', text, model: completion.model };
  }
}

/**
 * Adapt the OpenAI SDK to the completion seam
 */
export function createOpenAICompletionClient(apiKey: string): CompletionClient {
  const openai = new OpenAI({ apiKey });

  return {
    async complete(request) {
      const completion = await openai.chat.completions.create({
        model: request.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      return {
        content: completion.choices[0]?.message?.content ?? null,
        model: completion.model,
      };
    },
  };
}

// ============================================
// PROMPT
// ============================================

export function buildEnhancementPrompt(project: ProjectInput, output: ProjectOutput): string {
  const practices = [...output.temporary_practices, ...output.permanent_practices];
  const practicesSummary = practices.length > 0
    ? practices
        .map((p) => `- ${p.practice_type}: ${p.quantity} ${p.unit} (${p.justification})`)
        .join('\n')
    : '- None';

  return `Review these erosion control recommendations for a roadway project:

Project: ${project.project_name}
Jurisdiction: ${project.jurisdiction}
Total Disturbed Acres: ${project.total_disturbed_acres}
Predominant Soil: ${project.predominant_soil}
Predominant Slope: ${project.predominant_slope}
Average Slope: ${project.average_slope_percent}%
Drainage Features: ${project.drainage_features.length}
Phases: ${project.phases.length}

Recommended Practices:
${practicesSummary}

Please provide:
1. Overall assessment of the recommended practices
2. Any additional practices or considerations that should be evaluated
3. Potential risks or challenges specific to this project
4. Recommendations for sequencing or phasing of practices

Keep your response concise and actionable (under 300 words).`;
}

// ============================================
// ORCHESTRATION
// ============================================

export interface EnhanceOptions {
  timeoutMs?: number;
}

/**
 * Run the enhancer after the deterministic result exists
 *
 * The enhancer receives a deep copy; failures and timeouts become "unavailable".
 */
export async function enhanceProjectOutput(
  enhancer: ProjectEnhancer,
  project: ProjectInput,
  output: ProjectOutput,
  options: EnhanceOptions = {}
): Promise<EnhancedProjectOutput> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<EnhancementResult>((resolve) => {
    if (options.timeoutMs !== undefined) {
      timer = setTimeout(
        () => resolve({ status: 'unavailable', reason: `LLM enhancement timed out after ${options.timeoutMs}ms` }),
        options.timeoutMs
      );
    }
  });

  const attempt = (async (): Promise<EnhancementResult> => {
    try {
      return await enhancer.enhance(structuredClone(project), structuredClone(output));
    } catch (error) {
      logError(log, error, 'LLM enhancement failed', { project: project.project_name });
      return {
        status: 'unavailable',
        reason: `LLM enhancement failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      };
    }
  })();

  try {
    const enhancement = await Promise.race([attempt, timeout]);
    if (enhancement.status === 'unavailable') {
      log.warn({ project: project.project_name, reason: enhancement.reason }, 'LLM enhancement unavailable');
    }
    return { output, enhancement };
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
