import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  EngineUnavailableError,
  InvalidParameterError,
} from '../common/errors/knowledge-graph.errors';
import { errorMessage } from '../common/utils/validation';
import { DomainGraphStoreService } from '../domains/domain-graph-store.service';
import { RankedTerm } from '../graph/types/domain-graph.types';
import { KeywordExtractorService } from '../keywords/keyword-extractor.service';
import { TermExtractorService } from '../text/term-extractor.service';
import vocabulary from './cover-image-vocabulary.json';
import {
  IMAGE_ENGINE_AVAILABILITY,
  IMAGE_ENGINE_PRIORITY,
  IMAGE_GENERATOR,
  ImageEngine,
  ImageEngineAvailability,
  ImageGenerator,
  isImageEngine,
} from './image-engine.interface';

export const COVER_KEYWORD_LIMIT = 6;
export const EXCERPT_LIMIT = 300;
export const VISUAL_ELEMENT_LIMIT = 4;

export const COVER_IMAGE_STYLES = [
  'professional',
  'academic',
  'modern',
  'minimalist',
] as const;
export type CoverImageStyle = (typeof COVER_IMAGE_STYLES)[number];

export const DEFAULT_COVER_STYLE: CoverImageStyle = 'professional';
export const DEFAULT_DIMENSIONS = '1024x1024';

const DIMENSIONS_PATTERN = /^([1-9]\d*)x([1-9]\d*)$/;

const visualElements = new Map<string, string[]>(
  Object.entries(vocabulary.visualElements),
);
const sensitiveWords: ReadonlySet<string> = new Set(vocabulary.sensitiveWords);

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface CoverImagePrompt {
  domain: string;
  prompt: string;
  keywords: RankedTerm[];
  engineCandidates: ImageEngine[];
  style: CoverImageStyle;
  dimensions: ImageDimensions;
}

export interface RenderedCoverImage {
  imageUrl: string;
  engineUsed: ImageEngine;
}

function isCoverImageStyle(value: string): value is CoverImageStyle {
  return COVER_IMAGE_STYLES.some((style) => style === value);
}

/**
 * Turns editorial text into a deterministic image-generation prompt built
 * from the domain graph's strongest matching terms.
 */
@Injectable()
export class CoverImagePromptService {
  private readonly logger = new Logger(CoverImagePromptService.name);

  constructor(
    private readonly store: DomainGraphStoreService,
    private readonly keywords: KeywordExtractorService,
    private readonly extractor: TermExtractorService,
    @Inject(IMAGE_ENGINE_AVAILABILITY)
    private readonly availability: ImageEngineAvailability,
    @Optional()
    @Inject(IMAGE_GENERATOR)
    private readonly generator?: ImageGenerator,
  ) {}

  async synthesize(
    editorialText: string,
    domain: string,
    style: string = DEFAULT_COVER_STYLE,
    dimensions: string = DEFAULT_DIMENSIONS,
    preferredEngine?: string,
  ): Promise<CoverImagePrompt> {
    if (editorialText.trim().length === 0) {
      throw new InvalidParameterError('editorial_text must not be empty');
    }
    if (!isCoverImageStyle(style)) {
      throw new InvalidParameterError(
        `style must be one of ${COVER_IMAGE_STYLES.join(', ')} (got ${style})`,
      );
    }
    const size = this.parseDimensions(dimensions);
    let preferred: ImageEngine | undefined;
    if (preferredEngine !== undefined) {
      if (!isImageEngine(preferredEngine)) {
        throw new InvalidParameterError(
          `image_engine must be one of ${IMAGE_ENGINE_PRIORITY.join(', ')} (got ${preferredEngine})`,
        );
      }
      preferred = preferredEngine;
    }

    const graph = this.store.getGraph(domain);
    const keywords = await this.keywords.extract(
      editorialText,
      domain,
      COVER_KEYWORD_LIMIT,
    );
    const engineCandidates = this.engineCandidates(preferred);

    const prompt = this.buildPrompt({
      domain: graph.domain,
      style,
      size,
      keywords,
      editorialText,
    });

    this.logger.log(
      `Prompt for "${graph.domain}" from ${keywords.length} keywords, engines: ${engineCandidates.join(', ')}`,
    );

    return {
      domain: graph.domain,
      prompt,
      keywords,
      engineCandidates,
      style,
      dimensions: size,
    };
  }

  /**
   * Render a synthesized prompt, trying each candidate engine in order.
   * Resolves to undefined when no image generator is bound.
   */
  async render(
    synthesis: CoverImagePrompt,
  ): Promise<RenderedCoverImage | undefined> {
    const generator = this.generator;
    if (!generator) return undefined;

    const failures: string[] = [];
    for (const engine of synthesis.engineCandidates) {
      try {
        const image = await generator.generate({
          prompt: synthesis.prompt,
          engine,
          ...synthesis.dimensions,
        });
        return { imageUrl: image.imageUrl, engineUsed: engine };
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(`⚠️ ${engine} failed: ${message}`);
        failures.push(`${engine}: ${message}`);
      }
    }

    throw new EngineUnavailableError(
      `Every image engine failed (${failures.join('; ')})`,
    );
  }

  // ============================================
  // HELPERS
  // ============================================

  private parseDimensions(dimensions: string): ImageDimensions {
    const match = DIMENSIONS_PATTERN.exec(dimensions.trim());
    if (!match) {
      throw new InvalidParameterError(
        `dimensions must look like <width>x<height> (got ${dimensions})`,
      );
    }
    return { width: Number(match[1]), height: Number(match[2]) };
  }

  private engineCandidates(preferred?: ImageEngine): ImageEngine[] {
    const available = IMAGE_ENGINE_PRIORITY.filter((engine) =>
      this.availability.isAvailable(engine),
    );
    if (available.length === 0) {
      throw new EngineUnavailableError();
    }
    if (preferred === undefined || !available.includes(preferred)) {
      return available;
    }
    return [preferred, ...available.filter((engine) => engine !== preferred)];
  }

  private buildPrompt(input: {
    domain: string;
    style: CoverImageStyle;
    size: ImageDimensions;
    keywords: RankedTerm[];
    editorialText: string;
  }): string {
    const { domain, style, size, keywords, editorialText } = input;

    const subject =
      keywords.length > 0
        ? `Key concepts (by centrality): ${keywords.map((k) => k.term).join(', ')}`
        : `Editorial excerpt: "${this.excerpt(editorialText)}"`;

    const elements = (
      visualElements.get(domain) ?? vocabulary.defaultVisualElements
    ).slice(0, VISUAL_ELEMENT_LIMIT);

    const guidelines = this.isSensitive(editorialText)
      ? [
          '- Use a hopeful, supportive visual tone',
          '- Avoid dark or depressing imagery',
          '- Focus on treatment, care and hope',
          '- Use warm, professional colors',
        ]
      : [
          '- Professional, clean aesthetic',
          `- Appropriate for the ${domain} domain`,
          '- Focus on innovation and progress',
        ];

    return [
      `Create a ${style} cover image for a ${domain} editorial publication.`,
      '',
      subject,
      '',
      'Visual requirements:',
      `- Style: ${style} design approach`,
      `- Visual elements: ${elements.join(', ')}`,
      '- Layout: balanced composition with clear hierarchy',
      `- Dimensions: ${size.width}x${size.height}`,
      '',
      'Content guidelines:',
      ...guidelines,
    ].join('\n');
  }

  private excerpt(text: string): string {
    const collapsed = text.trim().replace(/\s+/g, ' ');
    if (collapsed.length <= EXCERPT_LIMIT) return collapsed;
    return `${collapsed.slice(0, EXCERPT_LIMIT - 3).trimEnd()}...`;
  }

  private isSensitive(text: string): boolean {
    return this.extractor
      .tokenize(text)
      .some((token) => sensitiveWords.has(token));
  }
}
