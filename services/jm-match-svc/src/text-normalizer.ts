import stopWordList from './stop-words.json';
import type { JobCandidate } from './types';

export interface CleanOptions {
  removeStopWords?: boolean;
}

export type ResumeSection = 'experience' | 'education' | 'skills' | 'summary';

export type KeySections = Record<ResumeSection, string> & { fullText: string };

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '-',
  mdash: '-',
  hellip: '...',
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
  bull: ' '
};

const SECTION_PATTERNS: ReadonlyArray<[ResumeSection, RegExp]> = [
  ['experience', /(?:work\s+)?experience|employment|professional\s+experience/],
  ['education', /education|academic|qualifications|degrees?/],
  ['skills', /skills|technical\s+skills|competencies|technologies/],
  ['summary', /summary|objective|profile|about/]
];

// A section runs at least this many characters before the next header is looked for.
const MIN_SECTION_LENGTH = 100;

const LOCATION_ALIASES: ReadonlyArray<[string, string]> = [
  ['saint louis', 'st. louis'],
  ['st louis', 'st. louis'],
  ['saint paul', 'st. paul'],
  ['st paul', 'st. paul'],
  ['new york city', 'new york'],
  ['nyc', 'new york'],
  ['san francisco bay area', 'san francisco'],
  ['sf bay area', 'san francisco'],
  ['washington dc', 'washington'],
  ['washington d.c.', 'washington']
];

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;

export const PHONE_PATTERNS: readonly RegExp[] = [/\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/, /\(\d{3}\)\s*\d{3}[-.]?\d{4}/];

export function globalPattern(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
}

function fromCodePoint(codePoint: number, fallback: string): string {
  return Number.isInteger(codePoint) && codePoint >= 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : fallback;
}

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      return fromCodePoint(Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/** Turns resume and job text into lowercase, markup-free text ready to embed. */
export class TextNormalizer {
  private readonly stopWords: ReadonlySet<string>;

  constructor(stopWords: readonly string[] = stopWordList) {
    this.stopWords = new Set(stopWords);
  }

  clean(text: string, { removeStopWords = false }: CleanOptions = {}): string {
    if (!text) {
      return '';
    }

    const withoutContacts = PHONE_PATTERNS.reduce(
      (current, pattern) => current.replace(globalPattern(pattern), ' '),
      decodeHtmlEntities(text)
        .replace(/<[^>]+>/g, ' ')
        .replace(/https?:\/\/\S+/g, ' ')
        .replace(globalPattern(EMAIL_PATTERN), ' ')
    );

    let result = withoutContacts
      .replace(/[^\p{L}\p{N}_\s.,!?;:()-]/gu, ' ')
      .replace(/[.,!?;:]+/g, ' ')
      .replace(/\s+/g, ' ')
      .toLowerCase()
      .trim();

    if (removeStopWords) {
      result = result
        .split(' ')
        .filter((word) => word.length > 2 && !this.stopWords.has(word))
        .join(' ');
    }

    return result;
  }

  extractKeySections(text: string): KeySections {
    const sections: KeySections = {
      experience: '',
      education: '',
      skills: '',
      summary: '',
      fullText: text
    };
    const lower = text.toLowerCase();

    for (const [name, pattern] of SECTION_PATTERNS) {
      const match = pattern.exec(lower);
      if (!match) {
        continue;
      }

      const start = match.index;
      const searchFrom = start + MIN_SECTION_LENGTH;
      const nextStarts = SECTION_PATTERNS.filter(([other]) => other !== name)
        .map(([, otherPattern]) => otherPattern.exec(lower.slice(searchFrom)))
        .filter((next): next is RegExpExecArray => next !== null)
        .map((next) => searchFrom + next.index);

      const end = nextStarts.length > 0 ? Math.min(...nextStarts) : text.length;
      sections[name] = text.slice(start, end).trim();
    }

    return sections;
  }

  /** Title weighted twice, then company, location, description, salary and job type. */
  prepareJobText(job: JobCandidate): string {
    const parts: string[] = [];
    if (job.title) {
      parts.push(job.title, job.title);
    }
    if (job.company) {
      parts.push(job.company);
    }
    if (job.location) {
      parts.push(job.location);
    }
    if (job.description) {
      parts.push(job.description);
    }
    if (job.salary) {
      parts.push(`salary ${job.salary}`);
    }
    if (job.jobType) {
      parts.push(job.jobType);
    }

    return this.clean(parts.join(' '));
  }

  prepareResumeText(text: string, focusSections: readonly ResumeSection[] = ['experience', 'skills']): string {
    const sections = this.extractKeySections(text);
    const parts: string[] = [];

    for (const section of focusSections) {
      const content = sections[section];
      if (content) {
        parts.push(content, content);
      }
    }
    parts.push(sections.fullText);

    return this.clean(parts.join(' '));
  }

  normalizeLocation(location: string): string {
    let result = location.toLowerCase().trim();
    for (const [alias, canonical] of LOCATION_ALIASES) {
      if (result.includes(alias)) {
        result = result.replaceAll(alias, canonical);
      }
    }
    return result;
  }
}
