import { z } from "zod";

export const userEmailParamSchema = z.object({
  email: z.string().trim().email("Invalid email format"),
});
