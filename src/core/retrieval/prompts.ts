import { hasCue, shapeCues } from './cues';
import type { DocTypeDefinition } from './docTypes';
import type { QueryShape } from './types';

export function detectQueryShape(question: string): QueryShape {
  if (hasCue(question, shapeCues.objectives)) return 'objectives';
  if (hasCue(question, shapeCues.list)) return 'list';
  if (hasCue(question, shapeCues.numerical)) return 'numerical';
  if (hasCue(question, shapeCues.procedural)) return 'procedural';
  // a comparison needs two named sides
  if (hasCue(question, shapeCues.comparison) && hasCue(question, ['and', 'or', 'with'])) return 'comparison';
  if (hasCue(question, shapeCues.definition)) return 'definition';
  return 'generic';
}

/** Lists, objectives and procedures need room for several items. */
export function tokenBudgetFor(shape: QueryShape, base: number): number {
  if (shape === 'list' || shape === 'objectives' || shape === 'procedural') return Math.max(base, 200);
  if (shape === 'comparison') return Math.max(base, 180);
  return base;
}

interface ShapeTemplate {
  intent: string;
  format: string[];
  label: string;
}

const SHAPE_TEMPLATES: Record<Exclude<QueryShape, 'generic'>, ShapeTemplate> = {
  list: {
    intent: 'CONTAINS a list or enumeration answering',
    format: [
      'Present the items as a numbered or bulleted list',
      'Each item is concise (1-2 lines)',
      'Use declarative language',
      '3-5 relevant items',
    ],
    label: 'Document fragment with list',
  },
  objectives: {
    intent: 'STATES formal objectives or goals answering',
    format: [
      'Present the objectives as a numbered list',
      'Start each objective with an infinitive verb (guarantee, promote, strengthen, establish)',
      'Formal institutional language',
      '2-4 relevant objectives',
    ],
    label: 'Document fragment with objectives',
  },
  numerical: {
    intent: 'CONTAINS specific figures (amounts, deadlines, percentages) answering',
    format: [
      'Include specific figures with context',
      'Use suitable units (currency, business days, percentages)',
      'Precise, quantitative language',
      '2-3 sentences with figures',
    ],
    label: 'Document fragment with figures',
  },
  procedural: {
    intent: 'DESCRIBES a process or procedure answering',
    format: [
      'Present the steps in sequence',
      'Use procedural language (shall, must, will proceed to)',
      'Name the actors involved when relevant',
      '3-5 main steps',
    ],
    label: 'Document fragment with procedure',
  },
  comparison: {
    intent: 'COMPARES the elements in',
    format: [
      'Present differences and similarities in a structured way',
      'Use comparative language (whereas, on the other hand, in contrast)',
      'Mention both elements being compared',
      '2-3 points of comparison',
    ],
    label: 'Document fragment with comparison',
  },
  definition: {
    intent: 'DEFINES the concept in',
    format: [
      'Start with "It is understood by..." or "It is the process/set/system..."',
      'A concise, complete definition',
      'Include the main characteristics',
      '2-3 sentences',
    ],
    label: 'Document fragment with definition',
  },
};

export function buildHypotheticalPrompt(question: string, shape: QueryShape, docType: DocTypeDefinition): string {
  if (shape === 'generic') {
    return docType.genericTemplate.split('{question}').join(question);
  }
  const t = SHAPE_TEMPLATES[shape];
  const format = [...t.format, docType.styleNote].map((line) => `- ${line}`).join('\n');
  return `You are an expert in regulatory and technical documents.

Task: write a document fragment that ${t.intent} the question below. Do not answer the question directly; write the text as it would appear in an official document.

Required format:
${format}

Question: ${question}

${t.label}:`;
}
