import { ToolErrorType } from '../../common/errors/knowledge-graph.errors';
import { ImageEngine } from '../../cover-image/image-engine.interface';
import { RankedTerm } from '../../graph/types/domain-graph.types';

export const TOOL_NAMES = [
  'build_knowledge_graph',
  'extract_keywords',
  'build_glossary',
  'generate_cover_image',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolDescription {
  name: ToolName;
  description: string;
}

export interface CentralityStats {
  min: number;
  max: number;
  mean: number;
}

export interface BuildKnowledgeGraphResult {
  status: 'success';
  domain: string;
  node_count: number;
  edge_count: number;
  reused: boolean;
  built_at: string;
  /** The most central terms, strongest first. */
  top_nodes: RankedTerm[];
}

export interface ExtractKeywordsResult {
  status: 'success';
  domain: string;
  keywords: RankedTerm[];
  summary: {
    count: number;
    centrality: CentralityStats & { median: number };
    high_centrality_count: number;
    medium_centrality_count: number;
    low_centrality_count: number;
  };
}

export interface GlossaryEntryResult {
  term: string;
  score: number;
  definition?: string;
}

export interface BuildGlossaryResult {
  status: 'success';
  domain: string;
  terms: GlossaryEntryResult[];
  /** Present for the markdown and csv formats. */
  rendered?: string;
  summary: {
    count: number;
    centrality: CentralityStats;
    high_centrality_count: number;
    medium_centrality_count: number;
    low_centrality_count: number;
    definition_count: number;
    definition_coverage: number;
  };
}

export interface GenerateCoverImageResult {
  status: 'success';
  domain: string;
  prompt: string;
  keywords: string[];
  engine_candidates: ImageEngine[];
  style: string;
  dimensions: string;
  image_url?: string;
  engine_used?: ImageEngine;
}

export type ToolSuccessResult =
  | BuildKnowledgeGraphResult
  | ExtractKeywordsResult
  | BuildGlossaryResult
  | GenerateCoverImageResult;

export interface ToolErrorResult {
  status: 'error';
  error_type: ToolErrorType | 'InternalError';
  /** `<error_type>: <description>` */
  message: string;
}

export type ToolResult = ToolSuccessResult | ToolErrorResult;
