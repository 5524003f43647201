/**
 * Tests for context assembly under a token budget
 */

import {
  AssembleInput,
  ContextAssembler,
  OVERFLOW_MESSAGE_TOKENS,
  formatDocumentBlock,
  formatToolBlock,
} from '../src/application/services/ContextAssembler.js';
import { TokenEstimator } from '../src/application/services/TokenEstimator.js';
import { RetrievedChunk } from '../src/core/entities/Document.js';
import { ModelContextProfiles } from '../src/core/models/ModelContextProfiles.js';
import { buildSystemPrompt } from '../src/core/prompts/systemPrompt.js';
import { TemplateType } from '../src/core/templates/types.js';

const MODEL = 'unit-model';
const NOW = new Date('2026-01-15T12:00:00Z');
const measure = new TokenEstimator(new ModelContextProfiles());

function chunk(documentId: number, content: string, score: number): RetrievedChunk {
  return { documentId, projectId: 1, chunkIndex: 0, source: `doc-${documentId}.md`, content, score };
}

function makeAssembler(contextLimit: number, templates: Record<string, TemplateType> = {}) {
  const estimator = new TokenEstimator(new ModelContextProfiles({ [MODEL]: contextLimit }));
  return new ContextAssembler(estimator, { responseReserveTokens: 0, templates }, () => NOW);
}

function baseInput(overrides: Partial<AssembleInput> = {}): AssembleInput {
  return {
    modelId: MODEL,
    enabledTools: [],
    documents: [],
    toolFragment: null,
    history: [],
    userMessage: 'What does the report say?',
    ...overrides,
  };
}

function systemTokens(input: AssembleInput, toolInstruction?: string): number {
  return measure.estimate(
    buildSystemPrompt({ basePrompt: input.basePrompt, enabledTools: input.enabledTools, currentDate: NOW, toolInstruction })
  );
}

describe('ContextAssembler', () => {
  it('should keep everything when the budget allows', () => {
    const input = baseInput({
      enabledTools: ['calculator'],
      documents: [chunk(1, 'Revenue grew.', 0.91), chunk(2, 'Costs fell.', 0.8)],
      toolFragment: { tool: 'calculator', text: 'Calculator result: 2 + 2 = 4' },
      history: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
      ],
    });

    const context = makeAssembler(100_000).assemble(input);

    expect(context.warnings).toEqual([]);
    expect(context.truncated).toBe(false);
    expect(context.toolIncluded).toBe(true);
    expect(context.historyDropped).toBe(0);
    expect(context.parts.contextBlocks).toEqual([
      '[Document: doc-1.md | relevance 0.91]\nRevenue grew.',
      '[Document: doc-2.md | relevance 0.80]\nCosts fell.',
      '[Tool output: calculator]\nCalculator result: 2 + 2 = 4',
    ]);
    expect(context.parts.history).toEqual(input.history);
    expect(context.estimatedTokens).toBe(
      context.tokens.systemTokens +
        context.tokens.documentTokens +
        context.tokens.toolTokens +
        context.tokens.historyTokens +
        context.tokens.messageTokens
    );
  });

  it('should subtract the response reserve from the budget', () => {
    const estimator = new TokenEstimator(new ModelContextProfiles({ [MODEL]: 4096 }));
    const assembler = new ContextAssembler(estimator, { responseReserveTokens: 1024 });

    expect(assembler.budgetFor(MODEL)).toBe(3072);
  });

  it('should truncate the message when system prompt and message do not fit', () => {
    const input = baseInput({ userMessage: 'a'.repeat(400) });
    const limit = systemTokens(input) + 20;

    const context = makeAssembler(limit).assemble(input);

    expect(context.truncated).toBe(true);
    expect(context.userMessage).toBe('a'.repeat(43));
    expect(context.tokens.messageTokens).toBe(20);
    expect(context.estimatedTokens).toBe(limit);
    expect(context.warnings.map((w) => w.kind)).toEqual(['MessageTruncated']);
  });

  it('should keep a short message whole when the system prompt alone overflows', () => {
    const input = baseInput({ userMessage: 'Short question' });

    const context = makeAssembler(100).assemble(input);

    expect(context.userMessage).toBe('Short question');
    expect(context.truncated).toBe(false);
    expect(context.warnings.map((w) => w.kind)).toEqual(['ContextOverflow']);
  });

  it('should still truncate a long message when the system prompt alone overflows', () => {
    const input = baseInput({ basePrompt: 'p'.repeat(2000), userMessage: 'b'.repeat(40_000) });

    const context = makeAssembler(200).assemble(input);

    expect(context.truncated).toBe(true);
    expect(context.userMessage).toBe('b'.repeat(219));
    expect(context.tokens.messageTokens).toBe(OVERFLOW_MESSAGE_TOKENS);
    expect(context.warnings.map((w) => w.kind)).toEqual(['ContextOverflow', 'MessageTruncated']);
  });

  it('should keep documents as a prefix of the ranking', () => {
    const documents = [chunk(1, 'first', 0.9), chunk(2, 'x'.repeat(2000), 0.8), chunk(3, 'third', 0.7)];
    const input = baseInput({ documents });
    const first = measure.estimate(formatDocumentBlock(documents[0]));
    const third = measure.estimate(formatDocumentBlock(documents[2]));
    const limit = systemTokens(input) + measure.estimate(input.userMessage) + first + third + 1;

    const context = makeAssembler(limit).assemble(input);

    expect(context.documents.map((d) => d.documentId)).toEqual([1]);
    expect(context.warnings).toEqual([
      { kind: 'ContextDropped', message: '2 of 3 document excerpts did not fit the context window.' },
    ]);
    expect(context.estimatedTokens).toBeLessThanOrEqual(context.budget);
  });

  it('should drop tool output that does not fit and its instruction', () => {
    const fragment = {
      tool: 'web_search' as const,
      text: 'y'.repeat(4000),
      systemInstruction: 'Base your answer only on these results.',
    };
    const input = baseInput({ enabledTools: ['web_search'], toolFragment: fragment });
    const limit =
      systemTokens(input, fragment.systemInstruction) + measure.estimate(input.userMessage) + 50;

    const context = makeAssembler(limit).assemble(input);

    expect(measure.estimate(formatToolBlock(fragment))).toBeGreaterThan(50);
    expect(context.toolIncluded).toBe(false);
    expect(context.parts.systemPrompt).toBe(
      buildSystemPrompt({ enabledTools: ['web_search'], currentDate: NOW })
    );
    expect(context.tokens.systemTokens).toBe(systemTokens(input));
    expect(context.warnings).toEqual([
      { kind: 'ContextDropped', message: 'Output of web_search did not fit the context window and was left out.' },
    ]);
  });

  it('should keep the newest history and stop at the first message that does not fit', () => {
    const history = [
      { role: 'user' as const, content: 'old' },
      { role: 'assistant' as const, content: 'z'.repeat(2000) },
      { role: 'user' as const, content: 'newest' },
    ];
    const input = baseInput({ history });
    const limit =
      systemTokens(input) + measure.estimate(input.userMessage) + measure.estimate('old') + measure.estimate('newest');

    const context = makeAssembler(limit).assemble(input);

    expect(context.parts.history).toEqual([{ role: 'user', content: 'newest' }]);
    expect(context.historyDropped).toBe(2);
    expect(context.warnings).toEqual([
      { kind: 'HistoryTrimmed', message: '2 older messages were left out of the context.' },
    ]);
  });

  it('should build a generate payload with the legacy template', () => {
    const input = baseInput({
      documents: [chunk(1, 'Revenue grew.', 0.5)],
      history: [{ role: 'user', content: 'Hi' }],
    });

    const context = makeAssembler(100_000).assemble(input);

    expect(context.payload).toEqual({
      type: 'generate',
      prompt:
        '[Document: doc-1.md | relevance 0.50]\nRevenue grew.\n\n' +
        'Previous conversation:\nUser: Hi\n\n' +
        'Current question: What does the report say?\nAssistant:',
      system: context.parts.systemPrompt,
    });
  });

  it('should build a chat payload when the model is configured for it', () => {
    const input = baseInput({
      documents: [chunk(1, 'Revenue grew.', 0.5)],
      history: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
      ],
    });

    const context = makeAssembler(100_000, { [MODEL]: 'chat' }).assemble(input);

    expect(context.payload).toEqual({
      type: 'chat',
      messages: [
        { role: 'system', content: `${context.parts.systemPrompt}\n\n[Document: doc-1.md | relevance 0.50]\nRevenue grew.` },
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
        { role: 'user', content: 'What does the report say?' },
      ],
    });
  });

  describe('truncateToFit', () => {
    it('should not split surrogate pairs', () => {
      const assembler = makeAssembler(4096);
      const text = '😀'.repeat(100);

      const result = assembler.truncateToFit(text, 20);

      expect(Array.from(result)).toHaveLength(43);
      expect(result).toBe('😀'.repeat(43));
    });

    it('should return an empty string when nothing fits', () => {
      expect(makeAssembler(4096).truncateToFit('hello', 5)).toBe('');
    });
  });
});
