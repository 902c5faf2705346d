export const DEFINITION_PROVIDER = Symbol('DEFINITION_PROVIDER');

export interface DefinitionRequest {
  term: string;
  domain: string;
  /** Strongest graph neighbours of the term, for context. */
  relatedTerms: string[];
}

/**
 * Supplies glossary definitions, typically backed by a language model. Not
 * bound by default; glossaries are then built without definitions.
 */
export interface DefinitionProvider {
  define(request: DefinitionRequest): Promise<string>;
}
