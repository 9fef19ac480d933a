import { z } from "zod";
import { formatZodIssues } from "../validation";

describe("formatZodIssues", () => {
  const schema = z.object({
    display: z.object({ width: z.number().int().positive() }),
    name: z.string(),
  });

  it("should prefix each issue with its path", () => {
    const result = schema.safeParse({ display: { width: -1 }, name: 3 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toEqual([
        "display.width: Number must be greater than 0",
        "name: Expected string, received number",
      ]);
    }
  });

  it("should leave root issues without a path", () => {
    const result = z.string().safeParse(1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toEqual([
        "Expected string, received number",
      ]);
    }
  });
});
