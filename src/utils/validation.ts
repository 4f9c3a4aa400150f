import { z } from "zod";
import { ValidationError } from "./errors";

export function validateSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context = "Validation failed",
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `${err.path.join(".") || "(root)"}: ${err.message}`)
      .join(", ");

    throw new ValidationError(`${context}: ${errors}`);
  }

  return result.data;
}
