import type {ZodError} from "zod";

/** Raised at the API boundary for malformed boxes, input lists or configuration. */
export class InvalidInputError extends Error {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'InvalidInputError';
    }

    static fromZod(message: string, error: ZodError): InvalidInputError {
        const issues = error.issues.map((issue) => {
            const where = issue.path.length ? issue.path.join('.') : '(root)';
            return `${where}: ${issue.message}`;
        });
        return new InvalidInputError(message, issues);
    }
}
