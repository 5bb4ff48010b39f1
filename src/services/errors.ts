/**
 * errors.ts — The one reportable failure of the analyzer.
 *
 * Text is never an error: anything that is not an alphabetic word is
 * filtered out. What can go wrong is the setup around the text, i.e. a
 * lexicon that is missing, empty or malformed, or a config file that
 * cannot be read. All of those surface as ConfigurationError.
 */

import type { ZodError } from 'zod';

export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/**
 * Render zod issues as "path: message" pairs for an error message.
 */
export function formatIssues(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}
