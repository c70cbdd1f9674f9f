import type { ZodType, ZodTypeDef } from "zod";
import { InvalidConfigError } from "./errors";

/**
 * Parses `value` or throws InvalidConfig listing every issue zod found.
 */
export function parseOrThrow<Output, Input>(
    schema: ZodType<Output, ZodTypeDef, Input>,
    value: unknown,
    what: string,
): Output {
    const result = schema.safeParse(value);
    if (result.success) {
        return result.data;
    }
    const detail = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
    throw new InvalidConfigError(`Invalid ${what}: ${detail}`);
}
