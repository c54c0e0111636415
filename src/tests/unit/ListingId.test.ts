import { buildListingId, normalizeUrl, resolveListingUrl } from '../../core/ListingId';
import { matchesAllKeywords, missingKeywords } from '../../filters/keywordFilter';

const BASE = 'https://www.olx.ua';

describe('ListingId', () => {
  describe('normalizeUrl', () => {
    it('resolves relative links and strips query and hash', () => {
      expect(normalizeUrl('/d/uk/obyavlenie/ps4-IDabc.html?reason=x#photos', BASE))
        .toBe('https://www.olx.ua/d/uk/obyavlenie/ps4-IDabc.html');
    });

    it('upgrades http to https', () => {
      expect(normalizeUrl('http://www.olx.ua/d/a.html')).toBe('https://www.olx.ua/d/a.html');
    });

    it('rejects other schemes and garbage', () => {
      expect(normalizeUrl('javascript:void(0)', BASE)).toBe('');
      expect(normalizeUrl('not a url')).toBe('');
      expect(normalizeUrl(null)).toBe('');
    });
  });

  it('keeps the query string in the link sent to the user', () => {
    expect(resolveListingUrl('/d/a.html?promoted=1', BASE)).toBe('https://www.olx.ua/d/a.html?promoted=1');
  });

  describe('buildListingId', () => {
    it('prefers the card id', () => {
      expect(buildListingId(' 812345 ', '/d/a.html', BASE)).toBe('812345');
    });

    it('falls back on the ad path so tracking parameters do not change identity', () => {
      expect(buildListingId(undefined, '/d/a.html?reason=1', BASE)).toBe('/d/a.html');
      expect(buildListingId('', 'https://www.olx.ua/d/a.html?reason=2', BASE)).toBe('/d/a.html');
    });

    it('uses the raw href when it cannot be parsed', () => {
      expect(buildListingId(undefined, ' mailto:x ', BASE)).toBe('mailto:x');
    });
  });
});

describe('keywordFilter', () => {
  it('matches case-insensitively on substrings', () => {
    expect(matchesAllKeywords('Sony PLAYSTATION 4 + TV', ['tv', 'playstation'])).toBe(true);
  });

  it('lists the keywords a title is missing', () => {
    expect(missingKeywords('Samsung TV 43', ['tv', 'playstation'])).toEqual(['playstation']);
  });

  it('accepts everything with no keywords', () => {
    expect(matchesAllKeywords('anything', [])).toBe(true);
  });
});
