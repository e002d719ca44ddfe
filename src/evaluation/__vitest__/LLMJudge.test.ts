/**
 * Test file for the LLM judge
 */
import { describe, it, expect, vi } from 'vitest';
import { JUDGE_RESPONSE_SCHEMA, LLMJudge, buildJudgePrompt, parseJudgeVerdict } from '../LLMJudge.js';
import type { ExtractionInput, ExtractionOutput } from '../types.js';
import { FakeModel, validConstituencyForm } from '../../__vitest__/fixtures.js';

const input: ExtractionInput = { formSetName: 'station-12', imagePaths: ['p1.png'] };
const expected = validConstituencyForm();
const output: ExtractionOutput = { form: validConstituencyForm(), forms: [], pageErrors: [] };

const verdictText = `\`\`\`json
{"score": 0.85, "reasoning": "One vote count off", "errors": [{"field": "voteRows[3].voteCount", "expected": 50, "actual": "49", "severity": "Major"}]}
\`\`\``;

function noSleep() {
  return vi.fn((_ms: number) => Promise.resolve());
}

describe('LLMJudge', () => {
  it('scores 0 without throwing when no model is configured', async () => {
    const judge = new LLMJudge(null);

    expect(judge.available).toBe(false);
    expect(await judge.evaluate(input, output, expected)).toEqual({
      evaluator: 'llm_judge',
      kind: 'numeric',
      value: 0,
      score: 0,
      reason: 'Judge model not configured',
      errors: [],
    });
  });

  it('returns the parsed verdict', async () => {
    const model = new FakeModel(() => verdictText);
    const judge = new LLMJudge(model, { sleep: noSleep() });

    const result = await judge.evaluate(input, output, expected);

    expect(result).toEqual({
      evaluator: 'llm_judge',
      kind: 'numeric',
      value: 0.85,
      score: 0.85,
      reasoning: 'One vote count off',
      errors: [{ field: 'voteRows[3].voteCount', expected: '50', actual: '49', severity: 'major' }],
    });
    expect(model.requests[0].temperature).toBe(0);
    expect(model.requests[0].responseSchema).toBe(JUDGE_RESPONSE_SCHEMA);
  });

  it.each([
    ['"1.4"', 1],
    ['-0.2', 0],
  ])('clamps a score of %s to %i', async (score, clamped) => {
    const judge = new LLMJudge(new FakeModel(() => `{"score": ${score}, "reasoning": "", "errors": []}`));

    const result = await judge.evaluate(input, output, expected);

    expect(result.score).toBe(clamped);
  });

  it('scores 0 for a response that is not JSON, without retrying', async () => {
    const model = new FakeModel(() => 'I think it looks fine');
    const sleep = noSleep();
    const judge = new LLMJudge(model, { sleep });

    const result = await judge.evaluate(input, output, expected);

    expect(result.score).toBe(0);
    expect(result.reason).toBe('Judge response is not valid JSON');
    expect(model.requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a failing call with exponential backoff', async () => {
    const model = new FakeModel((_request, call) => {
      if (call < 3) throw new Error('rate limited');
      return verdictText;
    });
    const sleep = noSleep();
    const judge = new LLMJudge(model, { maxAttempts: 3, retryDelayMs: 100, sleep });

    const result = await judge.evaluate(input, output, expected);

    expect(result.score).toBe(0.85);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([100, 200]);
  });

  it('retries an empty response', async () => {
    const model = new FakeModel((_request, call) => (call === 1 ? '   ' : verdictText));
    const judge = new LLMJudge(model, { sleep: noSleep() });

    const result = await judge.evaluate(input, output, expected);

    expect(result.score).toBe(0.85);
    expect(model.requests).toHaveLength(2);
  });

  it('scores 0 with the last failure once attempts run out', async () => {
    const model = new FakeModel(() => {
      throw new Error('quota exceeded');
    });
    const sleep = noSleep();
    const judge = new LLMJudge(model, { maxAttempts: 2, retryDelayMs: 100, sleep });

    const result = await judge.evaluate(input, output, expected);

    expect(result.score).toBe(0);
    expect(result.reason).toBe('quota exceeded');
    expect(model.requests).toHaveLength(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe('parseJudgeVerdict', () => {
  it('reports the field that breaks the verdict schema', () => {
    const outcome = parseJudgeVerdict('{"reasoning": "no score"}');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.reason).toMatch(/^Judge response does not match the verdict schema: score: /);
    }
  });

  it('defaults missing reasoning and errors', () => {
    const outcome = parseJudgeVerdict('{"score": 0.5}');

    expect(outcome).toEqual({ success: true, verdict: { score: 0.5, reasoning: '', errors: [] } });
  });
});

describe('buildJudgePrompt', () => {
  it('shows both forms without validation or source pages', () => {
    const prompt = buildJudgePrompt(input, output.form, expected);

    expect(prompt).toContain('Form set: station-12');
    expect(prompt).toContain('"pollingStationNumber": "12"');
    expect(prompt).not.toContain('sourcePages');
  });
});
