import { Injectable, Logger } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  InvalidParameterError,
  isKnowledgeGraphError,
} from '../common/errors/knowledge-graph.errors';
import {
  describeValidationErrors,
  errorMessage,
} from '../common/utils/validation';
import {
  CoverImagePromptService,
  DEFAULT_COVER_STYLE,
  DEFAULT_DIMENSIONS,
} from '../cover-image/cover-image-prompt.service';
import { DomainGraphStoreService } from '../domains/domain-graph-store.service';
import {
  BuildOutcome,
  DEFAULT_MAX_NODES,
} from '../domains/types/domain-store.types';
import {
  DEFAULT_GLOSSARY_MIN_CENTRALITY,
  DEFAULT_MAX_GLOSSARY_TERMS,
  GlossaryBuilderService,
  parseGlossaryFormat,
} from '../glossary/glossary-builder.service';
import { CentralityRankerService } from '../graph/centrality-ranker.service';
import { DEFAULT_MIN_EDGE_WEIGHT } from '../graph/types/domain-graph.types';
import {
  DEFAULT_KEYWORD_MIN_CENTRALITY,
  DEFAULT_MAX_KEYWORDS,
  KeywordExtractorService,
} from '../keywords/keyword-extractor.service';
import {
  BuildGlossaryArgsDto,
  BuildKnowledgeGraphArgsDto,
  DEFAULT_TOOL_DOMAIN,
  ExtractKeywordsArgsDto,
  GenerateCoverImageArgsDto,
} from './dto/tool-args.dto';
import {
  BuildGlossaryResult,
  BuildKnowledgeGraphResult,
  ExtractKeywordsResult,
  GenerateCoverImageResult,
  TOOL_NAMES,
  ToolDescription,
  ToolErrorResult,
  ToolName,
  ToolResult,
  ToolSuccessResult,
} from './types/tool-result.types';

export const DEFAULT_BUILD_MIN_CENTRALITY = 0.05;
export const TOP_NODE_LIMIT = 10;

export interface ToolContext {
  /** Aborts a graph build started by this call. */
  signal?: AbortSignal;
}

interface RegisteredTool {
  description: string;
  invoke(rawArgs: unknown, context: ToolContext): Promise<ToolSuccessResult>;
}

function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

/**
 * Entry point for callers that address the engine by tool name. Every
 * outcome, failures included, comes back as a `ToolResult`.
 */
@Injectable()
export class ToolDispatchService {
  private readonly logger = new Logger(ToolDispatchService.name);
  private readonly tools: ReadonlyMap<ToolName, RegisteredTool>;

  constructor(
    private readonly store: DomainGraphStoreService,
    private readonly keywords: KeywordExtractorService,
    private readonly glossary: GlossaryBuilderService,
    private readonly coverImage: CoverImagePromptService,
    private readonly ranker: CentralityRankerService,
  ) {
    this.tools = new Map<ToolName, RegisteredTool>([
      [
        'build_knowledge_graph',
        this.register(
          'build_knowledge_graph',
          'Build (or reuse) the co-occurrence knowledge graph of a domain from raw documents',
          BuildKnowledgeGraphArgsDto,
          (args, context) => this.buildKnowledgeGraph(args, context),
        ),
      ],
      [
        'extract_keywords',
        this.register(
          'extract_keywords',
          'Extract the most central domain terms found in a text',
          ExtractKeywordsArgsDto,
          (args) => this.extractKeywords(args),
        ),
      ],
      [
        'build_glossary',
        this.register(
          'build_glossary',
          "Build a glossary from a domain graph's most central terms",
          BuildGlossaryArgsDto,
          (args) => this.buildGlossary(args),
        ),
      ],
      [
        'generate_cover_image',
        this.register(
          'generate_cover_image',
          'Create a cover image prompt (and image, when an engine is bound) for editorial text',
          GenerateCoverImageArgsDto,
          (args) => this.generateCoverImage(args),
        ),
      ],
    ]);
  }

  listTools(): ToolDescription[] {
    return TOOL_NAMES.map((name) => ({
      name,
      description: this.tools.get(name)?.description ?? '',
    }));
  }

  /**
   * Run a tool by name. Never rejects.
   */
  async dispatch(
    name: string,
    rawArgs: unknown,
    context: ToolContext = {},
  ): Promise<ToolResult> {
    const startTime = Date.now();
    try {
      const tool = isToolName(name) ? this.tools.get(name) : undefined;
      if (!tool) {
        throw new InvalidParameterError(
          `Unknown tool "${name}". Available tools: ${TOOL_NAMES.join(', ')}`,
        );
      }

      const result = await tool.invoke(rawArgs, context);
      this.logger.log(`🔧 ${name} completed in ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      return this.toErrorResult(name, error);
    }
  }

  // ============================================
  // TOOLS
  // ============================================

  private async buildKnowledgeGraph(
    args: BuildKnowledgeGraphArgsDto,
    context: ToolContext,
  ): Promise<BuildKnowledgeGraphResult> {
    const options = {
      maxNodes: args.max_nodes ?? DEFAULT_MAX_NODES,
      minEdgeWeight: args.min_edge_weight ?? DEFAULT_MIN_EDGE_WEIGHT,
      minCentrality: args.min_centrality ?? DEFAULT_BUILD_MIN_CENTRALITY,
      signal: context.signal,
    };

    const outcome: BuildOutcome = args.rebuild
      ? {
          graph: await this.store.rebuild(args.domain, args.documents, options),
          reused: false,
        }
      : await this.store.obtain(args.domain, args.documents, options);

    return {
      status: 'success',
      domain: outcome.graph.domain,
      node_count: outcome.graph.nodes.size,
      edge_count: outcome.graph.edges.length,
      reused: outcome.reused,
      built_at: outcome.graph.builtAt.toISOString(),
      top_nodes: this.ranker
        .rankedTerms(outcome.graph)
        .slice(0, TOP_NODE_LIMIT),
    };
  }

  private async extractKeywords(
    args: ExtractKeywordsArgsDto,
  ): Promise<ExtractKeywordsResult> {
    const domain = args.domain ?? DEFAULT_TOOL_DOMAIN;
    const keywords = await this.keywords.extract(
      args.text,
      domain,
      args.max_keywords ?? DEFAULT_MAX_KEYWORDS,
      args.min_centrality ?? DEFAULT_KEYWORD_MIN_CENTRALITY,
    );
    const summary = this.keywords.summarize(keywords);

    return {
      status: 'success',
      domain: this.store.resolve(domain).key,
      keywords,
      summary: {
        count: summary.count,
        centrality: summary.centrality,
        high_centrality_count: summary.highCentralityCount,
        medium_centrality_count: summary.mediumCentralityCount,
        low_centrality_count: summary.lowCentralityCount,
      },
    };
  }

  private async buildGlossary(
    args: BuildGlossaryArgsDto,
  ): Promise<BuildGlossaryResult> {
    const domain = args.domain ?? DEFAULT_TOOL_DOMAIN;
    const format = parseGlossaryFormat(args.format ?? 'json');

    const terms = await this.glossary.build(
      domain,
      args.max_terms ?? DEFAULT_MAX_GLOSSARY_TERMS,
      args.min_centrality ?? DEFAULT_GLOSSARY_MIN_CENTRALITY,
      { includeDefinitions: args.include_definitions ?? true },
    );
    const summary = this.glossary.summarize(terms);
    const { key } = this.store.resolve(domain);

    return {
      status: 'success',
      domain: key,
      terms,
      ...(format === 'json'
        ? {}
        : { rendered: this.glossary.export(terms, format, key) }),
      summary: {
        count: summary.count,
        centrality: summary.centrality,
        high_centrality_count: summary.highCentralityCount,
        medium_centrality_count: summary.mediumCentralityCount,
        low_centrality_count: summary.lowCentralityCount,
        definition_count: summary.definitionCount,
        definition_coverage: summary.definitionCoverage,
      },
    };
  }

  private async generateCoverImage(
    args: GenerateCoverImageArgsDto,
  ): Promise<GenerateCoverImageResult> {
    const synthesis = await this.coverImage.synthesize(
      args.editorial_text,
      args.domain ?? DEFAULT_TOOL_DOMAIN,
      args.style ?? DEFAULT_COVER_STYLE,
      args.dimensions ?? DEFAULT_DIMENSIONS,
      args.image_engine ?? undefined,
    );
    const rendered = await this.coverImage.render(synthesis);

    return {
      status: 'success',
      domain: synthesis.domain,
      prompt: synthesis.prompt,
      keywords: synthesis.keywords.map((k) => k.term),
      engine_candidates: synthesis.engineCandidates,
      style: synthesis.style,
      dimensions: `${synthesis.dimensions.width}x${synthesis.dimensions.height}`,
      ...(rendered
        ? { image_url: rendered.imageUrl, engine_used: rendered.engineUsed }
        : {}),
    };
  }

  // ============================================
  // HELPERS
  // ============================================

  private register<T extends object>(
    name: ToolName,
    description: string,
    dto: ClassConstructor<T>,
    run: (args: T, context: ToolContext) => Promise<ToolSuccessResult>,
  ): RegisteredTool {
    return {
      description,
      invoke: async (rawArgs, context) =>
        run(await this.parseArgs(name, dto, rawArgs), context),
    };
  }

  private async parseArgs<T extends object>(
    name: ToolName,
    dto: ClassConstructor<T>,
    rawArgs: unknown,
  ): Promise<T> {
    const plain = rawArgs ?? {};
    if (typeof plain !== 'object' || Array.isArray(plain)) {
      throw new InvalidParameterError(
        `Arguments for ${name} must be a JSON object`,
      );
    }

    const args = plainToInstance(dto, plain);
    const errors = await validate(args, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      throw new InvalidParameterError(
        `Invalid arguments for ${name}: ${describeValidationErrors(errors).join('; ')}`,
      );
    }
    return args;
  }

  private toErrorResult(name: string, error: unknown): ToolErrorResult {
    if (isKnowledgeGraphError(error)) {
      this.logger.warn(`⚠️ ${name} failed: ${error.errorType}: ${error.message}`);
      return {
        status: 'error',
        error_type: error.errorType,
        message: `${error.errorType}: ${error.message}`,
      };
    }

    this.logger.error(
      `❌ ${name} failed unexpectedly: ${errorMessage(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return {
      status: 'error',
      error_type: 'InternalError',
      message: `InternalError: ${errorMessage(error)}`,
    };
  }
}
