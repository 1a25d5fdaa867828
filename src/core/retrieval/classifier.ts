import { z } from 'zod';
import { withTimeout } from '../async';
import { classificationCues, hasCue } from './cues';
import { detectStructuralReference, hasStructuralFilters } from './structural';
import {
  QUERY_TYPES,
  type ClassifierName,
  type CompletionService,
  type QueryType,
  type RetrievalScope,
} from './types';

export interface Classification {
  queryType: QueryType;
  subQueries: string[];
  reasoning: string;
}

export interface QueryClassifier {
  readonly name: ClassifierName;
  classify(query: string, scope: RetrievalScope): Promise<Classification>;
}

// ── Heuristic ──────────────────────────────────────────────────────────────

const COMPARISON_PATTERNS: RegExp[] = [
  /\bbetween\s+(.+?)\s+and\s+(.+)$/i,
  /\bcompare\s+(.+?)\s+(?:and|with|to)\s+(.+)$/i,
  /\b(?:differences?|contrast)\s+(?:of|in)\s+(.+?)\s+and\s+(.+)$/i,
  /^(.+?)\s+(?:vs\.?|versus)\s+(.+)$/i,
];

function stripTrailingPunctuation(text: string): string {
  return text.trim().replace(/[?.!;:]+$/g, '').trim();
}

function cleanEntity(raw: string): string {
  return stripTrailingPunctuation(raw).replace(/^(?:the|a|an)\s+/i, '').trim();
}

/** The two sides of a comparison question, or [] when they cannot be told apart. */
export function extractComparisonEntities(query: string): string[] {
  const q = stripTrailingPunctuation(query);
  for (const pattern of COMPARISON_PATTERNS) {
    const m = pattern.exec(q);
    if (!m) continue;
    const left = cleanEntity(m[1] ?? '');
    const right = cleanEntity(m[2] ?? '');
    if (left && right && left.toLowerCase() !== right.toLowerCase()) return [left, right];
  }
  return [];
}

/** Conditions first, consequence last. */
export function splitConditional(query: string): string[] {
  const q = stripTrailingPunctuation(query);
  const leading = /^(?:if|when|unless|in case(?: of)?)\s+(.+?),\s*(.+)$/i.exec(q);
  if (leading) {
    const condition = stripTrailingPunctuation(leading[1] ?? '');
    const consequence = stripTrailingPunctuation(leading[2] ?? '');
    if (condition && consequence) return [condition, `${consequence}?`];
  }
  const trailing = /^(.+?)\s+(?:if|when|unless)\s+(.+)$/i.exec(q);
  if (trailing) {
    const consequence = stripTrailingPunctuation(trailing[1] ?? '');
    const condition = stripTrailingPunctuation(trailing[2] ?? '');
    if (condition && consequence) return [condition, `${consequence}?`];
  }
  return [];
}

export function classifyHeuristically(query: string, scope: RetrievalScope = {}): Classification {
  const q = String(query ?? '').trim();
  const cues = classificationCues;

  if (hasCue(q, cues.comparison)) {
    const entities = extractComparisonEntities(q);
    return {
      queryType: 'comparison',
      subQueries: entities.map((e) => `What are the key points of ${e}?`),
      reasoning: 'heuristic: comparison cue',
    };
  }

  if (hasCue(q, cues.conditional)) {
    return {
      queryType: 'conditional',
      subQueries: splitConditional(q),
      reasoning: 'heuristic: conditional cue',
    };
  }

  if (hasStructuralFilters(detectStructuralReference(q)) || hasStructuralFilters(scope.filters)) {
    return { queryType: 'structural', subQueries: [], reasoning: 'heuristic: explicit structural reference' };
  }

  if (hasCue(q, cues.aggregation)) {
    return { queryType: 'aggregation', subQueries: [], reasoning: 'heuristic: aggregation cue' };
  }

  if (hasCue(q, cues.procedural)) {
    return { queryType: 'procedural', subQueries: [], reasoning: 'heuristic: procedural cue' };
  }

  if (hasCue(q, cues.reasoning)) {
    return { queryType: 'reasoning', subQueries: [], reasoning: 'heuristic: reasoning cue' };
  }

  return { queryType: 'simple_semantic', subQueries: [], reasoning: 'heuristic: no cue matched' };
}

export class HeuristicClassifier implements QueryClassifier {
  readonly name = 'heuristic' as const;

  async classify(query: string, scope: RetrievalScope): Promise<Classification> {
    return classifyHeuristically(query, scope);
  }
}

// ── LLM ────────────────────────────────────────────────────────────────────

export const ClassificationPayloadSchema = z.object({
  query_type: z.enum(QUERY_TYPES),
  sub_queries: z.array(z.string()).default([]),
  reasoning: z.string().optional(),
});

export function buildClassificationPrompt(query: string): string {
  return `You analyse questions asked to a retrieval system over regulatory and technical documents.

Classify the question and decide whether it needs several search steps.

QUERY TYPES:
- "simple_semantic": direct question answered by one passage
- "structural": asks for the content of a specific chapter, title, article, section or annex
- "comparison": compares two or more elements
- "procedural": asks for a process or procedure with several steps
- "conditional": contains conditions ("if ... then ...")
- "aggregation": lists or enumerates several elements
- "reasoning": needs inference across sources

Return sub_queries only when answering needs more than one search; otherwise return an empty list.

Examples:

Question: "What is a regional funding committee?"
{"query_type": "simple_semantic", "sub_queries": [], "reasoning": "Definition answered by a single passage"}

Question: "Can I adjust the schedule of a science project in phase II?"
{"query_type": "conditional", "sub_queries": ["Which project variables can be adjusted?", "Is the schedule one of the adjustable variables?", "What specific requirements apply to adjustments in phase II?"], "reasoning": "Needs the adjustable variables first, then phase II requirements"}

Question: "What are the differences between Agreement 03/2021 and Agreement 13/2025?"
{"query_type": "comparison", "sub_queries": ["What are the main provisions of Agreement 03/2021?", "What are the main provisions of Agreement 13/2025?", "Which articles changed between both agreements?"], "reasoning": "Needs both documents before comparing"}

Answer with a single JSON object with the keys query_type, sub_queries and reasoning.

Question: ${JSON.stringify(query)}`;
}

export function extractJsonObject(text: string): unknown {
  const unfenced = String(text ?? '').replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start < 0 || end <= start) throw new Error('no JSON object in completion');
  return JSON.parse(unfenced.slice(start, end + 1));
}

export function parseClassification(text: string): Classification {
  const payload = ClassificationPayloadSchema.parse(extractJsonObject(text));
  return {
    queryType: payload.query_type,
    subQueries: payload.sub_queries,
    reasoning: payload.reasoning ?? '',
  };
}

export interface LlmClassifierOptions {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export class LlmClassifier implements QueryClassifier {
  readonly name = 'llm' as const;

  constructor(
    private readonly completion: CompletionService,
    private readonly options: LlmClassifierOptions
  ) {}

  async classify(query: string): Promise<Classification> {
    const prompt = buildClassificationPrompt(query);
    const out = await withTimeout('completion', this.options.timeoutMs, () =>
      this.completion.complete(prompt, {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        json: true,
      })
    );
    return parseClassification(out.text);
  }
}
