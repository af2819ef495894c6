import { z } from "zod";

/** Empty strings count as unset, the way `[ -z "$BRANCH" ]` treats them. */
const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

export const BranchSchema = z
  .string()
  .regex(/^[A-Za-z0-9._/-]+$/, "Must be a git branch or tag name")
  .refine((ref) => !ref.includes(".."), "Must not contain '..'")
  .describe("Branch or tag of the upstream repository to install from");

export const EnvSchema = z.object({
  BRANCH: z.preprocess(emptyAsUndefined, BranchSchema.optional()),
  PATH: z.string().default(""),
});

export type InstallerEnv = z.infer<typeof EnvSchema>;
