import { InvalidParameterError } from '../common/errors/knowledge-graph.errors';
import {
  domainSlug,
  normalizeDomainName,
  resolveDomainName,
} from './domain-names';

describe('domain names', () => {
  it('normalizes case and whitespace', () => {
    expect(normalizeDomainName('  Cancer \t Health   CARE ')).toBe(
      'cancer health care',
    );
  });

  it.each(['cancer_care', 'Cancer Care', 'cancer health care'])(
    'resolves %p to the canonical cancer key',
    (name) => {
      expect(resolveDomainName(name)).toEqual({
        key: 'cancer health care',
        aliases: ['cancer health care', 'cancer_care', 'cancer care'],
        slug: 'cancer_health_care',
      });
    },
  );

  it('keys other domains by their normalized name', () => {
    expect(resolveDomainName(' Precision  Medicine ')).toEqual({
      key: 'precision medicine',
      aliases: ['precision medicine'],
      slug: 'precision_medicine',
    });
  });

  it('builds file-safe slugs', () => {
    expect(domainSlug('../etc/passwd')).toBe('etc_passwd');
    expect(domainSlug('oncology (adult)')).toBe('oncology_adult');
  });

  it.each(['', '   ', '???'])('rejects %p', (name) => {
    expect(() => resolveDomainName(name)).toThrow(InvalidParameterError);
  });
});
