import type { z } from 'zod';
import type { ToolArguments } from './types.js';

/**
 * Validate raw model-supplied arguments against a tool's schema.
 * Throws with a readable message; the answer loop turns it into tool text.
 */
export function parseToolArguments<T extends z.ZodTypeAny>(
    toolName: string,
    schema: T,
    args: ToolArguments
): z.infer<T> {
    const result = schema.safeParse(args);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join(', ');
        throw new Error(`Invalid arguments for ${toolName}: ${issues}`);
    }
    return result.data;
}
