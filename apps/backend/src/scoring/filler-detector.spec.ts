import { detectFillers } from './filler-detector';

describe('detectFillers', () => {
  it('should count each filler in a transcript', () => {
    expect(detectFillers('Um, I like, you know, basically like it')).toEqual({
      um: 1,
      like: 2,
      'you know': 1,
      basically: 1,
    });
  });

  it('should match drawn-out hesitations', () => {
    expect(detectFillers('Ummm well uhh I think')).toEqual({ um: 1, uh: 1 });
  });

  it('should only count "so" when it leads into another filler', () => {
    expect(detectFillers('So yeah, I think so. It was so good.')).toEqual({ so: 1 });
  });

  it('should not match fillers inside other words', () => {
    expect(detectFillers('The summary was likely accurate.')).toEqual({});
  });

  it('should return an empty map for an empty transcript', () => {
    expect(detectFillers('')).toEqual({});
  });
});
