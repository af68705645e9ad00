import { describe, expect, it } from 'vitest';

import { parseCliArgs } from '../cli-args';

describe('parseCliArgs', () => {
  it('reads the resume path and leaves unset options undefined', () => {
    expect(parseCliArgs(['resume.pdf'])).toEqual({
      resumePath: 'resume.pdf',
      location: undefined,
      keywords: undefined,
      maxJobs: undefined,
      topN: undefined,
      filters: undefined,
      output: undefined,
      saveArtifacts: true,
      help: false
    });
  });

  it('parses search options and filters', () => {
    const options = parseCliArgs([
      'cv.docx',
      '--location',
      'Remote',
      '--keywords',
      'data engineer',
      '--max-jobs',
      '120',
      '--top-n',
      '5',
      '--min-salary',
      '90000',
      '--experience',
      'senior',
      'LEAD',
      '--job-type',
      'contract',
      '--skills',
      'python, sql,,',
      '--output',
      'top.csv',
      '--no-artifacts'
    ]);

    expect(options).toEqual({
      resumePath: 'cv.docx',
      location: 'Remote',
      keywords: 'data engineer',
      maxJobs: 120,
      topN: 5,
      filters: {
        salaryMin: 90000,
        experienceLevels: ['Senior', 'Lead'],
        jobTypes: ['Contract'],
        requiredSkills: ['python', 'sql']
      },
      output: 'top.csv',
      saveArtifacts: false,
      help: false
    });
  });

  it('returns early for --help without a resume', () => {
    expect(parseCliArgs(['--help'])).toEqual({ resumePath: '', saveArtifacts: true, help: true });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['cv.txt', '--colour', 'blue'])).toThrow('Unknown flag --colour');
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['cv.txt', '--location'])).toThrow('Missing value for flag --location');
    expect(() => parseCliArgs(['cv.txt', '--experience', '--top-n', '3'])).toThrow(
      'Missing value for flag --experience'
    );
  });

  it('rejects values outside the known choices', () => {
    expect(() => parseCliArgs(['cv.txt', '--job-type', 'gig'])).toThrow(
      expect.objectContaining({ code: 'invalid_input', details: { flag: 'job-type', value: 'gig' } })
    );
  });

  it('rejects malformed numbers', () => {
    expect(() => parseCliArgs(['cv.txt', '--top-n', 'ten'])).toThrow('--top-n expects a non-negative integer, got "ten".');
  });

  it('requires exactly one resume path', () => {
    expect(() => parseCliArgs([])).toThrow('Expected exactly one resume path.');
    expect(() => parseCliArgs(['a.txt', 'b.txt'])).toThrow('Expected exactly one resume path.');
  });
});
