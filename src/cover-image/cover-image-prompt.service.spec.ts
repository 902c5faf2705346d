import { Test } from '@nestjs/testing';
import {
  EngineUnavailableError,
  GraphNotFoundError,
  InvalidParameterError,
} from '../common/errors/knowledge-graph.errors';
import { DomainGraphStoreService } from '../domains/domain-graph-store.service';
import { KeywordExtractorService } from '../keywords/keyword-extractor.service';
import { TermExtractorService } from '../text/term-extractor.service';
import { rankedGraphOf } from '../../test/fixtures/graph.fixtures';
import { CoverImagePromptService } from './cover-image-prompt.service';
import {
  IMAGE_ENGINE_AVAILABILITY,
  IMAGE_GENERATOR,
  ImageEngine,
  ImageGenerator,
} from './image-engine.interface';

describe('CoverImagePromptService', () => {
  const graph = rankedGraphOf(
    {
      oncology: 0.4,
      immunotherapy: 0.45,
      cancer: 0.3,
      biopsy: 0.2,
      screening: 0.1,
      tumour: 0.15,
      staging: 0.12,
      radiotherapy: 0.08,
    },
    [],
    'cancer health care',
  );
  const store = {
    getGraph: jest.fn((domain: string) => {
      if (domain === 'cancer_care') return graph;
      throw new GraphNotFoundError(domain);
    }),
  };

  const compile = async (
    engines: ImageEngine[] = ['dall-e-3', 'stable-diffusion-xl'],
    generator?: ImageGenerator,
  ) => {
    const available = new Set<ImageEngine>(engines);
    const module = await Test.createTestingModule({
      providers: [
        CoverImagePromptService,
        KeywordExtractorService,
        TermExtractorService,
        { provide: DomainGraphStoreService, useValue: store },
        {
          provide: IMAGE_ENGINE_AVAILABILITY,
          useValue: { isAvailable: (e: ImageEngine) => available.has(e) },
        },
        ...(generator ? [{ provide: IMAGE_GENERATOR, useValue: generator }] : []),
      ],
    }).compile();
    return module.get(CoverImagePromptService);
  };

  describe('synthesize', () => {
    it('builds a deterministic prompt from the strongest terms', async () => {
      const service = await compile();

      const result = await service.synthesize(
        'Immunotherapy and biopsy advances in oncology.',
        'cancer_care',
      );

      expect(result.keywords.map((k) => k.term)).toEqual([
        'immunotherapy',
        'oncology',
        'biopsy',
      ]);
      expect(result.engineCandidates).toEqual([
        'dall-e-3',
        'stable-diffusion-xl',
      ]);
      expect(result.dimensions).toEqual({ width: 1024, height: 1024 });
      expect(result.prompt).toBe(
        [
          'Create a professional cover image for a cancer health care editorial publication.',
          '',
          'Key concepts (by centrality): immunotherapy, oncology, biopsy',
          '',
          'Visual requirements:',
          '- Style: professional design approach',
          '- Visual elements: molecular structures, DNA helix, cell division, medical research',
          '- Layout: balanced composition with clear hierarchy',
          '- Dimensions: 1024x1024',
          '',
          'Content guidelines:',
          '- Professional, clean aesthetic',
          '- Appropriate for the cancer health care domain',
          '- Focus on innovation and progress',
        ].join('\n'),
      );
    });

    it('returns the same prompt for the same input', async () => {
      const service = await compile();
      const text = 'Cancer screening and tumour staging.';

      const [a, b] = await Promise.all([
        service.synthesize(text, 'cancer_care', 'modern', '1920x1080'),
        service.synthesize(text, 'cancer_care', 'modern', '1920x1080'),
      ]);

      expect(a.prompt).toBe(b.prompt);
    });

    it('uses at most six keywords', async () => {
      const service = await compile();

      const result = await service.synthesize(
        'oncology immunotherapy cancer biopsy screening tumour staging radiotherapy',
        'cancer_care',
      );

      expect(result.keywords.map((k) => k.term)).toEqual([
        'immunotherapy',
        'oncology',
        'cancer',
        'biopsy',
        'tumour',
        'staging',
      ]);
    });

    it('falls back to an excerpt when no keyword matches', async () => {
      const service = await compile();

      const result = await service.synthesize(
        '   A  story\nabout   hope.  ',
        'cancer_care',
      );

      expect(result.keywords).toEqual([]);
      expect(result.prompt.split('\n')[2]).toBe(
        'Editorial excerpt: "A story about hope."',
      );
    });

    it('caps the excerpt at 300 characters', async () => {
      const service = await compile();

      const result = await service.synthesize(
        'word '.repeat(100),
        'cancer_care',
      );

      const match = /^Editorial excerpt: "(.*)"$/.exec(
        result.prompt.split('\n')[2],
      );
      expect(match?.[1]).toHaveLength(300);
      expect(match?.[1].endsWith(' wo...')).toBe(true);
    });

    it('asks for a hopeful tone around sensitive words', async () => {
      const service = await compile();

      const sensitive = await service.synthesize(
        'Pain management in oncology',
        'cancer_care',
      );
      const plain = await service.synthesize(
        'Oncology in Spain',
        'cancer_care',
      );

      expect(sensitive.prompt).toContain(
        '- Use a hopeful, supportive visual tone',
      );
      expect(plain.prompt).toContain('- Professional, clean aesthetic');
    });

    it('moves an available preferred engine to the front', async () => {
      const service = await compile();

      const preferred = await service.synthesize(
        'oncology',
        'cancer_care',
        'academic',
        '512x512',
        'stable-diffusion-xl',
      );
      const unavailable = await service.synthesize(
        'oncology',
        'cancer_care',
        'academic',
        '512x512',
        'gpt-image-1',
      );

      expect(preferred.engineCandidates).toEqual([
        'stable-diffusion-xl',
        'dall-e-3',
      ]);
      expect(unavailable.engineCandidates).toEqual([
        'dall-e-3',
        'stable-diffusion-xl',
      ]);
    });

    it('fails when no engine is available', async () => {
      const service = await compile([]);

      await expect(
        service.synthesize('oncology', 'cancer_care'),
      ).rejects.toBeInstanceOf(EngineUnavailableError);
    });

    it.each([
      ['baroque', '1024x1024', undefined],
      ['modern', '1024', undefined],
      ['modern', '0x512', undefined],
      ['modern', '512x512', 'midjourney'],
    ])(
      'rejects style %p, dimensions %p, engine %p',
      async (style, dimensions, engine) => {
        const service = await compile();

        await expect(
          service.synthesize('oncology', 'cancer_care', style, dimensions, engine),
        ).rejects.toBeInstanceOf(InvalidParameterError);
      },
    );

    it('fails for an unknown domain', async () => {
      const service = await compile();

      await expect(
        service.synthesize('oncology', 'unknown_domain'),
      ).rejects.toBeInstanceOf(GraphNotFoundError);
    });
  });

  describe('render', () => {
    it('does nothing without a generator', async () => {
      const service = await compile();
      const synthesis = await service.synthesize('oncology', 'cancer_care');

      await expect(service.render(synthesis)).resolves.toBeUndefined();
    });

    it('falls through to the next engine on failure', async () => {
      const generate = jest.fn(async (request: { engine: ImageEngine }) => {
        if (request.engine === 'dall-e-3') throw new Error('quota');
        return { imageUrl: `https://images.test/${request.engine}.png` };
      });
      const service = await compile(undefined, { generate });
      const synthesis = await service.synthesize(
        'oncology',
        'cancer_care',
        'modern',
        '1792x1024',
      );

      await expect(service.render(synthesis)).resolves.toEqual({
        imageUrl: 'https://images.test/stable-diffusion-xl.png',
        engineUsed: 'stable-diffusion-xl',
      });
      expect(generate).toHaveBeenLastCalledWith({
        prompt: synthesis.prompt,
        engine: 'stable-diffusion-xl',
        width: 1792,
        height: 1024,
      });
    });

    it('fails once every engine has failed', async () => {
      const generate = jest.fn(async () => {
        throw new Error('quota');
      });
      const service = await compile(undefined, { generate });
      const synthesis = await service.synthesize('oncology', 'cancer_care');

      await expect(service.render(synthesis)).rejects.toThrow(
        'Every image engine failed (dall-e-3: quota; stable-diffusion-xl: quota)',
      );
    });
  });
});
