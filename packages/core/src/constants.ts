/** Terms that mark a page as interview-prep material. Matched as substrings. */
export const INTERVIEW_KEYWORDS = [
  'interview',
  'question',
  'technical',
  'coding',
  'problem',
  'solution',
  'assessment',
  'test',
  'challenge',
  'exercise',
  'practice',
  'mock',
  'preparation',
  'guide',
  'tutorial',
] as const;

/** Source labels/hosts trusted for interview content (substring, case-insensitive). */
export const CREDIBLE_SOURCES = [
  'github',
  'leetcode',
  'hackerrank',
  'geeksforgeeks',
  'medium',
  'stackoverflow',
  'reddit',
  'kaggle',
  'datacamp',
  'coursera',
  'edx',
  'udemy',
  'freecodecamp',
  'w3schools',
  'tutorialspoint',
] as const;

/** Domains used for site-restricted search queries. */
export const SEARCH_DOMAINS = [
  'github.com',
  'medium.com',
  'reddit.com',
  'leetcode.com',
  'hackerrank.com',
  'stratascratch.com',
  'geeksforgeeks.org',
  'kaggle.com',
] as const;

export const CHARS_PER_TOKEN = 4;
export const NO_TITLE = 'No Title';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Known question-bank pages, by source. Mined when the caller gives no seed URLs. */
export const DIRECT_SOURCES = {
  GitHub: [
    'https://github.com/topics/data-science-interview',
    'https://github.com/topics/machine-learning-interview',
    'https://github.com/topics/python-interview',
    'https://github.com/topics/sql-interview',
  ],
  LeetCode: ['https://leetcode.com/problemset/all/', 'https://leetcode.com/company/'],
  HackerRank: ['https://www.hackerrank.com/domains', 'https://www.hackerrank.com/contests'],
  GeeksforGeeks: [
    'https://www.geeksforgeeks.org/data-science-interview-questions/',
    'https://www.geeksforgeeks.org/machine-learning-interview-questions/',
    'https://www.geeksforgeeks.org/python-interview-questions/',
  ],
  W3Schools: ['https://www.w3schools.com/python/', 'https://www.w3schools.com/sql/'],
} as const satisfies Record<string, readonly string[]>;

/** Subreddits searched for interview threads. */
export const INTERVIEW_SUBREDDITS = [
  'datascience',
  'learnmachinelearning',
  'MachineLearning',
  'cscareerquestions',
  'AskProgramming',
] as const;
