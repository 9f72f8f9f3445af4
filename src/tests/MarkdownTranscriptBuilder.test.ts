import { MarkdownTranscriptBuilder, formatRun, resolveSpeaker } from '../builders/MarkdownTranscriptBuilder';
import type { TranscriptionResult } from '../types/transcript';
import { punct, segment, word } from './helpers';

function transcript(
  items: TranscriptionResult['items'],
  speakerSegments: TranscriptionResult['speakerSegments'] = []
): TranscriptionResult {
  return { transcriptText: '', items, speakerSegments };
}

// mulberry32: a small seeded generator so failures reproduce
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomTranscript(seed: number): TranscriptionResult {
  const random = seededRandom(seed);
  const pick = <T>(values: T[]): T => values[Math.floor(random() * values.length)];

  const speakerSegments: TranscriptionResult['speakerSegments'] = [];
  let segmentStart = 0;
  for (let i = Math.floor(random() * 5); i > 0; i--) {
    const start = segmentStart + random() * 3;
    const end = start + random() * 10;
    speakerSegments.push(segment(pick(['spk_0', 'spk_1', 'spk_2']), start, end));
    segmentStart = end;
  }

  const items: TranscriptionResult['items'] = [];
  let time = 0;
  for (let i = Math.floor(random() * 30); i > 0; i--) {
    if (random() < 0.25) {
      items.push(punct(pick(['.', ',', '?', '!'])));
    } else {
      const start = time + random();
      const end = start + random();
      items.push(word(pick(['we', 'ship', 'today', 'okay', 'right']), start, end));
      time = end;
    }
  }

  return transcript(items, speakerSegments);
}

function expectedRunCount(result: TranscriptionResult): number {
  let runs = 0;
  let previous: string | undefined;
  for (const item of result.items) {
    if (item.kind !== 'word') {
      continue;
    }
    const label = resolveSpeaker(item.startTime, result.speakerSegments);
    if (runs === 0 || label !== previous) {
      runs++;
    }
    previous = label;
  }
  return runs;
}

describe('MarkdownTranscriptBuilder', () => {
  const builder = new MarkdownTranscriptBuilder();

  describe('render', () => {
    test('renders only the title for an empty transcript', () => {
      expect(builder.render(transcript([]))).toBe('# Meeting Transcript\n\n');
    });

    test('renders a single word for a single speaker', () => {
      const result = transcript([word('Hello', 0, 1)], [segment('spk_0', 0, 2)]);

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_0][00:00-00:01]: Hello');
    });

    test('glues punctuation onto the preceding word', () => {
      const result = transcript(
        [word('Hello', 0, 1), word('world', 1, 2), punct('.')],
        [segment('spk_0', 0, 2)]
      );

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_0][00:00-00:02]: Hello world.');
    });

    test('appends consecutive punctuation marks in order', () => {
      const result = transcript(
        [word('the', 0, 0.4), word('end', 0.4, 0.9), punct('.'), punct('"')],
        [segment('spk_0', 0, 1)]
      );

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_0][00:00-00:00]: the end."');
    });

    test('drops punctuation that arrives before any word', () => {
      const result = transcript([punct(','), word('Hi', 0, 1)], [segment('spk_0', 0, 1)]);

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_0][00:00-00:01]: Hi');
    });

    test('starts a new entry when the speaker changes', () => {
      const result = transcript(
        [word('Good', 0, 0.5), word('morning', 0.5, 1), word('Hi', 2, 3)],
        [segment('spk_0', 0, 1), segment('spk_1', 2, 3)]
      );

      expect(builder.render(result)).toBe(
        [
          '# Meeting Transcript',
          '',
          '[speaker: spk_0][00:00-00:01]: Good morning',
          '',
          '[speaker: spk_1][00:02-00:03]: Hi'
        ].join('\n')
      );
    });

    test('splits adjacent segments with no gap between them', () => {
      const result = transcript(
        [word('one', 0, 0.9), word('two', 1.1, 1.5)],
        [segment('spk_0', 0, 1), segment('spk_1', 1.05, 2)]
      );

      expect(builder.render(result).split('\n\n').slice(1)).toEqual([
        '[speaker: spk_0][00:00-00:00]: one',
        '[speaker: spk_1][00:01-00:01]: two'
      ]);
    });

    test('does not merge runs of the same speaker separated by another speaker', () => {
      const result = transcript(
        [word('a', 0, 1), word('b', 5, 6), word('c', 10, 11)],
        [segment('spk_0', 0, 2), segment('spk_1', 4, 7), segment('spk_0', 9, 12)]
      );

      expect(builder.render(result).split('\n\n').slice(1)).toEqual([
        '[speaker: spk_0][00:00-00:01]: a',
        '[speaker: spk_1][00:05-00:06]: b',
        '[speaker: spk_0][00:10-00:11]: c'
      ]);
    });

    test('groups words outside every segment into one unlabelled entry', () => {
      const result = transcript(
        [word('off', 5, 6), word('mic', 6, 7)],
        [segment('spk_0', 0, 2)]
      );

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: ][00:05-00:07]: off mic');
    });

    test('renders every word unlabelled when there are no segments', () => {
      const result = transcript([word('Hello', 0, 1), punct('?')]);

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: ][00:00-00:01]: Hello?');
    });

    test('separates labelled and unlabelled runs', () => {
      const result = transcript(
        [word('Hello', 0, 1), word('uh', 3, 3.5), word('Yes', 4, 4.5)],
        [segment('spk_0', 0, 2), segment('spk_1', 4, 5)]
      );

      expect(builder.render(result).split('\n\n').slice(1)).toEqual([
        '[speaker: spk_0][00:00-00:01]: Hello',
        '[speaker: ][00:03-00:03]: uh',
        '[speaker: spk_1][00:04-00:04]: Yes'
      ]);
    });

    test('picks the first listed segment when overlapping segments contain a word', () => {
      const items = [word('overlap', 5, 5.5)];

      expect(builder.render(transcript(items, [segment('spk_wide', 0, 10), segment('spk_tight', 4, 6)]))).toBe(
        '# Meeting Transcript\n\n[speaker: spk_wide][00:05-00:05]: overlap'
      );
      expect(builder.render(transcript(items, [segment('spk_tight', 4, 6), segment('spk_wide', 0, 10)]))).toBe(
        '# Meeting Transcript\n\n[speaker: spk_tight][00:05-00:05]: overlap'
      );
    });

    test('keeps segments with identical intervals and uses the first one', () => {
      const result = transcript([word('same', 1, 1.5)], [segment('spk_a', 0, 2), segment('spk_b', 0, 2)]);

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_a][00:01-00:01]: same');
    });

    test('truncates fractional seconds in timestamps', () => {
      const result = transcript([word('late', 120.2, 125.7)], [segment('spk_0', 120, 130)]);

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_0][02:00-02:05]: late');
    });

    test('uses the start of the first word and the end of the last word', () => {
      const result = transcript(
        [word('a', 61.9, 62.4), punct(','), word('b', 62.5, 70.99)],
        [segment('spk_0', 60, 80)]
      );

      expect(builder.render(result)).toBe('# Meeting Transcript\n\n[speaker: spk_0][01:01-01:10]: a, b');
    });

    test('attaches punctuation to the new run after a speaker change', () => {
      const result = transcript(
        [word('Ready', 0, 1), word('Yes', 2, 3), punct('!')],
        [segment('spk_0', 0, 1), segment('spk_1', 2, 3)]
      );

      expect(builder.render(result).split('\n\n').slice(1)).toEqual([
        '[speaker: spk_0][00:00-00:01]: Ready',
        '[speaker: spk_1][00:02-00:03]: Yes!'
      ]);
    });

    test('holds its entry invariants on generated transcripts', () => {
      for (let seed = 1; seed <= 200; seed++) {
        const result = randomTranscript(seed);
        const document = builder.render(result);
        const entries = document.split('\n\n').slice(1).filter(entry => entry !== '');

        expect(builder.render(result)).toBe(document);
        expect(entries).toHaveLength(expectedRunCount(result));
        expect(document).not.toMatch(/ [.,?!]/);
        for (const entry of entries) {
          expect(entry).toMatch(/^\[speaker: [^\]]*\]\[\d{2}:\d{2}-\d{2}:\d{2}\]: \S/);
        }
      }
    });

    test('does not modify its input', () => {
      const result = transcript([word('Hello', 0, 1), punct('.')], [segment('spk_0', 0, 1)]);
      const before = JSON.stringify(result);

      builder.render(result);

      expect(JSON.stringify(result)).toBe(before);
    });
  });

  describe('resolveSpeaker', () => {
    const segments = [segment('spk_0', 0, 2), segment('spk_1', 2, 4)];

    test('includes both interval ends', () => {
      expect(resolveSpeaker(0, segments)).toBe('spk_0');
      expect(resolveSpeaker(2, segments)).toBe('spk_0');
      expect(resolveSpeaker(4, segments)).toBe('spk_1');
    });

    test('returns undefined outside every segment', () => {
      expect(resolveSpeaker(4.01, segments)).toBeUndefined();
      expect(resolveSpeaker(1, [])).toBeUndefined();
    });
  });

  describe('formatRun', () => {
    test('renders an unlabelled run with an empty speaker tag', () => {
      expect(formatRun({ speakerLabel: undefined, startTime: 59.9, endTime: 61, words: ['a', 'b'] })).toBe(
        '[speaker: ][00:59-01:01]: a b'
      );
    });
  });

  describe('countSpeakers', () => {
    test('counts distinct labels', () => {
      const result = transcript([], [segment('spk_0', 0, 1), segment('spk_1', 1, 2), segment('spk_0', 2, 3)]);

      expect(builder.countSpeakers(result)).toBe(2);
    });

    test('is zero without segments', () => {
      expect(builder.countSpeakers(transcript([]))).toBe(0);
    });
  });

  describe('preview', () => {
    const document = [
      '# Meeting Transcript',
      '',
      '[speaker: spk_0][00:00-00:01]: One',
      '',
      '[speaker: spk_1][00:01-00:02]: Two',
      '',
      '[speaker: spk_0][00:02-00:03]: Three'
    ].join('\n');

    test('returns the first two entries by default', () => {
      expect(builder.preview(document)).toBe(
        '[speaker: spk_0][00:00-00:01]: One\n[speaker: spk_1][00:01-00:02]: Two'
      );
    });

    test('honours the entry count', () => {
      expect(builder.preview(document, 1)).toBe('[speaker: spk_0][00:00-00:01]: One');
    });

    test('is empty for an empty document', () => {
      expect(builder.preview('# Meeting Transcript\n\n')).toBe('');
    });
  });
});
