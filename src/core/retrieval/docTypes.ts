export interface DocTypeDefinition {
  name: string;
  /** Style guidance appended to every hypothetical-passage prompt for this register. */
  styleNote: string;
  /** Prompt used for generic-shaped questions; `{question}` is replaced. */
  genericTemplate: string;
  /** Exact document identifiers known to belong to this register. */
  documents?: string[];
  /** Substrings of a document identifier that suggest this register. */
  keywords?: string[];
}

export const GENERIC_DOC_TYPE = 'generic';

const BUILTIN_DOC_TYPES: DocTypeDefinition[] = [
  {
    name: 'legal',
    styleNote: 'Use a formal legal register with the terminology of statutes and regulations (approval, filing, competent authority).',
    genericTemplate: `You are an expert in statutes, agreements and regulations.

Task: write a fragment of a formal legal document that WOULD answer the question below. Do not answer the question directly; write the text as it would appear in an official legal document.

Text characteristics:
- Formal, technical legal style
- Correct regulatory terminology
- 2-3 concise sentences
- Declarative, not interrogative
- No invented article citations

Question: {question}

Hypothetical legal fragment:`,
    keywords: ['agreement', 'decree', 'resolution', 'law', 'regulation', 'statute', 'ordinance'],
  },
  {
    name: 'technical',
    styleNote: 'Use a formal technical register with project terminology (expected outputs, funding sources, methodology).',
    genericTemplate: `You are an expert in technical documents for investment projects.

Task: write a fragment of a technical project document that WOULD answer the question below. Do not answer the question directly; write the text as it would appear in a technical project document.

Text characteristics:
- Formal technical style
- Project terminology (expected outputs, funding sources, methodology, results and impacts)
- 2-3 concise sentences
- Declarative, describing the project
- May include figures when relevant

Question: {question}

Hypothetical technical fragment:`,
    keywords: ['technical', 'project', 'plan', 'specification', 'manual', 'guide'],
  },
  {
    name: GENERIC_DOC_TYPE,
    styleNote: 'Use a formal, professional register.',
    genericTemplate: `Write a fragment of a formal document that would answer the question below.

Characteristics:
- Formal, professional style
- 2-3 concise sentences
- Declarative, not interrogative

Question: {question}

Hypothetical document fragment:`,
  },
];

/**
 * Maps document identifiers to a prompt register. New registers are added
 * with `register()`; lookup order is hint, exact document id, keyword, generic.
 */
export class DocTypeRegistry {
  private readonly types = new Map<string, DocTypeDefinition>();
  private readonly documents = new Map<string, string>();

  constructor(definitions: DocTypeDefinition[] = BUILTIN_DOC_TYPES) {
    for (const def of definitions) this.register(def);
    if (!this.types.has(GENERIC_DOC_TYPE)) {
      const generic = BUILTIN_DOC_TYPES.find((d) => d.name === GENERIC_DOC_TYPE);
      if (generic) this.register(generic);
    }
  }

  register(def: DocTypeDefinition): this {
    const name = def.name.trim().toLowerCase();
    if (!name) throw new Error('doc type name is required');
    this.types.set(name, { ...def, name });
    for (const docId of def.documents ?? []) this.documents.set(docId.toLowerCase(), name);
    return this;
  }

  /** Pin a single document identifier to a register. */
  assignDocument(documentId: string, typeName: string): this {
    const name = typeName.trim().toLowerCase();
    if (!this.types.has(name)) throw new Error(`unknown doc type: ${typeName}`);
    this.documents.set(documentId.toLowerCase(), name);
    return this;
  }

  names(): string[] {
    return Array.from(this.types.keys());
  }

  get(name: string): DocTypeDefinition | undefined {
    return this.types.get(name.trim().toLowerCase());
  }

  infer(documentId: string | undefined): string {
    if (!documentId) return GENERIC_DOC_TYPE;
    const id = documentId.toLowerCase();
    const exact = this.documents.get(id);
    if (exact) return exact;
    for (const def of this.types.values()) {
      if ((def.keywords ?? []).some((kw) => id.includes(kw.toLowerCase()))) return def.name;
    }
    return GENERIC_DOC_TYPE;
  }

  resolve(options: { hint?: string; documentIds?: string[] }): DocTypeDefinition {
    const hinted = options.hint ? this.get(options.hint) : undefined;
    if (hinted) return hinted;
    const ids = options.documentIds ?? [];
    // A single document decides the register; several documents only agree on one.
    const inferred = new Set(ids.map((id) => this.infer(id)));
    const name = inferred.size === 1 ? Array.from(inferred)[0] ?? GENERIC_DOC_TYPE : GENERIC_DOC_TYPE;
    return this.get(name) ?? this.fallback();
  }

  private fallback(): DocTypeDefinition {
    const generic = this.types.get(GENERIC_DOC_TYPE);
    if (!generic) throw new Error('generic doc type is not registered');
    return generic;
  }
}
