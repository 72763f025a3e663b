/**
 * @prepscout/schemas - zod schemas and inferred types shared by every package
 */

export * from './enums';
export * from './job-profile';
export * from './content';
export * from './candidate';
export * from './compression';
