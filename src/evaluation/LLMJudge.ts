/**
 * LLM Judge
 *
 * Scores an extraction against ground truth with a second, independently
 * configured model. The judge never throws: a missing model, a failed call
 * or an unparseable verdict all yield score 0 with the cause logged.
 */

import { z } from 'zod';
import type { GenerativeModel } from '../extraction/types.js';
import type { ConsolidatedForm } from '../types/forms.js';
import type { EvaluationResult, Evaluator, ExtractionInput, ExtractionOutput, JudgeFinding } from './types.js';
import { EVALUATOR_NAMES } from './evaluators.js';
import { extractJsonText } from '../extraction/schema.js';
import { sleep as defaultSleep } from '../utils/workerPool.js';
import { logger } from '../utils/logger.js';

export const JUDGE_RESPONSE_SCHEMA: Record<string, unknown> = {
  type: 'OBJECT',
  properties: {
    score: { type: 'NUMBER', description: 'Quality score between 0.0 (worst) and 1.0 (perfect)' },
    reasoning: { type: 'STRING', description: 'Brief explanation of the score' },
    errors: {
      type: 'ARRAY',
      description: 'List of specific errors found',
      items: {
        type: 'OBJECT',
        properties: {
          field: { type: 'STRING', description: 'Field path with error' },
          expected: { type: 'STRING', description: 'Expected value' },
          actual: { type: 'STRING', description: 'Actual value' },
          severity: { type: 'STRING', enum: ['minor', 'major', 'critical'] },
        },
      },
    },
  },
  required: ['score', 'reasoning', 'errors'],
};

const printable = z.preprocess(
  value => (value === null || value === undefined ? '' : typeof value === 'string' ? value : JSON.stringify(value)),
  z.string()
);

export const JudgeVerdictSchema = z.object({
  score: z.preprocess(value => (typeof value === 'string' ? Number(value) : value), z.number().finite()),
  reasoning: z.string().default(''),
  errors: z
    .array(
      z.object({
        field: z.string(),
        expected: printable,
        actual: printable,
        severity: z.preprocess(
          value => (typeof value === 'string' ? value.toLowerCase().trim() : value),
          z.enum(['minor', 'major', 'critical'])
        ),
      })
    )
    .default([]),
});

export type JudgeVerdict = z.infer<typeof JudgeVerdictSchema>;

export interface LLMJudgeOptions {
  /** Attempts per record for failed or empty calls */
  maxAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * The data a judge sees for one form: extracted fields only
 */
function judgeView(form: ConsolidatedForm): Omit<ConsolidatedForm, 'validation' | 'sourcePages'> {
  return {
    formInfo: form.formInfo,
    voterStatistics: form.voterStatistics,
    ballotStatistics: form.ballotStatistics,
    voteRows: form.voteRows,
  };
}

export function buildJudgePrompt(input: ExtractionInput, output: ConsolidatedForm, expected: ConsolidatedForm): string {
  return `You are an expert election data quality evaluator. Assess how accurately the extracted data matches the ground truth.

Form set: ${input.formSetName}

Model output (extracted data):
\`\`\`json
${JSON.stringify(judgeView(output), null, 2)}
\`\`\`

Ground truth (expected output):
\`\`\`json
${JSON.stringify(judgeView(expected), null, 2)}
\`\`\`

Compare them across four dimensions:
- Form information (form type, date, location, polling station)
- Voter statistics (eligible voters, voters present)
- Ballot statistics (allocated, used, valid, void, no-vote, remaining)
- Vote results (numbers, names, vote counts)

List every wrong, missing or extra value with its field path, expected value, actual value and a severity of minor, major or critical.

Give an overall score from 0.0 to 1.0:
- 1.0 = perfect match
- 0.8-0.9 = minor errors
- 0.6-0.7 = some errors
- 0.4-0.5 = many errors
- 0.0-0.3 = mostly incorrect

Respond with JSON only: {"score": number, "reasoning": string, "errors": [{"field", "expected", "actual", "severity"}]}`;
}

export type VerdictParseOutcome = { success: true; verdict: JudgeVerdict } | { success: false; reason: string };

export function parseJudgeVerdict(text: string): VerdictParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonText(text));
  } catch {
    return { success: false, reason: 'Judge response is not valid JSON' };
  }

  const result = JudgeVerdictSchema.safeParse(json);
  if (!result.success) {
    return {
      success: false,
      reason: `Judge response does not match the verdict schema: ${result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    };
  }
  return { success: true, verdict: result.data };
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export class LLMJudge implements Evaluator {
  readonly name = EVALUATOR_NAMES.judge;
  readonly kind = 'numeric' as const;

  private readonly model: GenerativeModel | null;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs?: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(model: GenerativeModel | null, options: LLMJudgeOptions = {}) {
    this.model = model;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get available(): boolean {
    return this.model !== null;
  }

  evaluate(input: ExtractionInput, output: ExtractionOutput, expected: ConsolidatedForm): Promise<EvaluationResult> {
    return this.judge(input, output.form, expected);
  }

  async judge(input: ExtractionInput, output: ConsolidatedForm, expected: ConsolidatedForm): Promise<EvaluationResult> {
    if (!this.model) {
      logger.warn(`Judge model not configured; scoring ${input.formSetName} as 0`);
      return this.degraded('Judge model not configured');
    }

    const prompt = buildJudgePrompt(input, output, expected);
    let text = '';
    let lastFailure = '';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const result = await this.model.generate({
          prompt,
          responseSchema: JUDGE_RESPONSE_SCHEMA,
          temperature: 0,
          timeoutMs: this.timeoutMs,
        });
        text = result.text.trim();
        if (text !== '') break;
        lastFailure = 'Judge returned an empty response';
      } catch (error) {
        lastFailure = error instanceof Error ? error.message : String(error);
      }

      if (attempt < this.maxAttempts) {
        const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
        logger.warn(`Judge attempt ${attempt}/${this.maxAttempts} failed for ${input.formSetName}, retrying in ${delay}ms`, {
          reason: lastFailure,
        });
        await this.sleep(delay);
      }
    }

    if (text === '') {
      logger.error(`Judge call failed for ${input.formSetName}: ${lastFailure}`);
      return this.degraded(lastFailure);
    }

    const parsed = parseJudgeVerdict(text);
    if (!parsed.success) {
      logger.error(`Judge verdict unusable for ${input.formSetName}: ${parsed.reason}`);
      return this.degraded(parsed.reason);
    }

    const score = clampScore(parsed.verdict.score);
    const findings: JudgeFinding[] = parsed.verdict.errors;
    logger.debug(`Judge scored ${input.formSetName}: ${score}`, { errors: findings.length });

    return {
      evaluator: this.name,
      kind: this.kind,
      value: score,
      score,
      reasoning: parsed.verdict.reasoning,
      errors: findings,
    };
  }

  private degraded(reason: string): EvaluationResult {
    return {
      evaluator: this.name,
      kind: this.kind,
      value: 0,
      score: 0,
      reason,
      errors: [],
    };
  }
}
