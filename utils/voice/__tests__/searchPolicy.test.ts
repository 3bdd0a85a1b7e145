import { firstResult, preferDurationWithin } from '../searchPolicy';
import type { MediaInfo } from '../searchPolicy';

const results: MediaInfo[] = [
  { title: 'Full album', url: 'https://www.youtube.com/watch?v=aaaaaaaaaaa', duration: 3600 },
  { title: 'Live', url: 'https://www.youtube.com/watch?v=bbbbbbbbbbb', duration: 0 },
  { title: 'Single', url: 'https://www.youtube.com/watch?v=ccccccccccc', duration: 210 },
];

describe('searchPolicy', () => {
  it('firstResult takes the first entry and asks for one candidate', () => {
    expect(firstResult.candidates).toBe(1);
    expect(firstResult.pick('q', results)?.title).toBe('Full album');
    expect(firstResult.pick('q', [])).toBeUndefined();
  });

  it('preferDurationWithin skips long and unknown durations', () => {
    const policy = preferDurationWithin(600);

    expect(policy.candidates).toBe(5);
    expect(policy.name).toBe('duration-within-600s');
    expect(policy.pick('q', results)?.title).toBe('Single');
  });

  it('preferDurationWithin falls back to the first entry', () => {
    const policy = preferDurationWithin(60, 3);

    expect(policy.pick('q', results)?.title).toBe('Full album');
  });
});
