import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { describeError, getLogger } from '@jobmatch/common';
import { parseOfficeAsync } from 'officeparser';
import type { Logger } from 'pino';

import { EMAIL_PATTERN, globalPattern, PHONE_PATTERNS } from './text-normalizer';
import type { ResumeExtractor } from './types';

const OFFICE_EXTENSIONS = new Set(['.pdf', '.docx', '.doc']);

const RESUME_KEYWORDS = [
  'experience',
  'education',
  'skills',
  'work',
  'employment',
  'university',
  'college',
  'degree',
  'bachelor',
  'master',
  'phone',
  'email',
  'address',
  'linkedin',
  'github',
  'summary',
  'objective',
  'qualifications',
  'achievements'
];

const MIN_RESUME_CHARACTERS = 50;
const MIN_RESUME_WORDS = 100;

export interface ContactInfo {
  emails: string[];
  phones: string[];
  linkedin: string | null;
  github: string | null;
}

export type OfficeTextParser = (file: Buffer) => Promise<string>;

export interface FileResumeExtractorOptions {
  parseOffice?: OfficeTextParser;
  logger?: Logger;
}

export function isSupportedResume(filePath: string): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.txt' || OFFICE_EXTENSIONS.has(extension);
}

/** Decodes as UTF-8, falling back to latin1 when the bytes are not valid UTF-8. */
export function decodeText(buffer: Buffer): string {
  const utf8 = buffer.toString('utf8');
  return utf8.includes('\uFFFD') ? buffer.toString('latin1') : utf8;
}

/**
 * Reads resume text from .txt, .pdf, .docx or .doc files. Returns null for
 * unsupported formats, unreadable files and documents without text.
 */
export class FileResumeExtractor implements ResumeExtractor {
  private readonly parseOffice: OfficeTextParser;
  private readonly logger: Logger;

  constructor({ parseOffice, logger }: FileResumeExtractorOptions = {}) {
    this.parseOffice = parseOffice ?? ((file) => parseOfficeAsync(file));
    this.logger = logger ?? getLogger({ module: 'resume-extractor' });
  }

  async extract(filePath: string): Promise<string | null> {
    if (!filePath) {
      return null;
    }

    const extension = path.extname(filePath).toLowerCase();
    if (!isSupportedResume(filePath)) {
      this.logger.error({ extension }, 'Unsupported resume format.');
      return null;
    }

    try {
      const buffer = await readFile(filePath);
      const text = extension === '.txt' ? decodeText(buffer) : await this.parseOffice(buffer);

      if (text.trim().length === 0) {
        this.logger.warn({ extension }, 'Resume file contains no extractable text.');
        return null;
      }

      this.logger.info({ extension, characters: text.length }, 'Resume text extracted.');
      return text;
    } catch (error) {
      this.logger.error({ extension, error: describeError(error) }, 'Error parsing resume.');
      return null;
    }
  }
}

/**
 * Heuristic check that extracted text reads like a resume: at least 50
 * characters, and two of: three resume keywords, an e-mail address, a phone
 * number, 100 words.
 */
export function validateResumeContent(text: string): boolean {
  if (text.trim().length < MIN_RESUME_CHARACTERS) {
    return false;
  }

  const lower = text.toLowerCase();
  const keywordCount = RESUME_KEYWORDS.filter((keyword) => lower.includes(keyword)).length;
  const criteria = [
    keywordCount >= 3,
    EMAIL_PATTERN.test(text),
    PHONE_PATTERNS.some((pattern) => pattern.test(text)),
    text.split(/\s+/).filter((word) => word.length > 0).length >= MIN_RESUME_WORDS
  ];

  return criteria.filter(Boolean).length >= 2;
}

export function extractContactInfo(text: string): ContactInfo {
  return {
    emails: text.match(globalPattern(EMAIL_PATTERN)) ?? [],
    phones: PHONE_PATTERNS.flatMap((pattern) => text.match(globalPattern(pattern)) ?? []),
    linkedin: /linkedin\.com\/in\/[\w-]+/i.exec(text)?.[0] ?? null,
    github: /github\.com\/[\w-]+/i.exec(text)?.[0] ?? null
  };
}
