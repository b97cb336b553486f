import { z } from "zod";

const nonEmpty = z.string().trim().min(1, "must not be empty");

const EXPORT_KEY_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const SettingSchema = z
  .object({
    domain: nonEmpty,
    key: nonEmpty,
    value: z.union([z.string(), z.number(), z.boolean()]),
    type: z.enum(["string", "int", "float", "bool"])
  })
  .strict()
  .superRefine((setting, ctx) => {
    const { value, type } = setting;
    const ok =
      (type === "string" && typeof value === "string") ||
      (type === "bool" && typeof value === "boolean") ||
      (type === "int" && typeof value === "number" && Number.isInteger(value)) ||
      (type === "float" && typeof value === "number" && Number.isFinite(value));
    if (!ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["value"],
        message: `value ${JSON.stringify(value)} does not match type ${type}`
      });
    }
  });

export const AppStoreAppSchema = z
  .object({
    id: z.number().int().positive(),
    name: nonEmpty
  })
  .strict();

export const DockReplaceSchema = z
  .object({
    add: nonEmpty,
    replace: nonEmpty
  })
  .strict()
  .refine((entry) => entry.add !== entry.replace, {
    message: "add and replace must name different items"
  });

export const IdentitySchema = z
  .object({
    name: nonEmpty,
    email: nonEmpty
  })
  .strict();

export const ShellSchema = z
  .object({
    profile: nonEmpty.optional(),
    exports: z.record(z.string()).default({})
  })
  .strict()
  .superRefine((shell, ctx) => {
    for (const [key, value] of Object.entries(shell.exports)) {
      if (!EXPORT_KEY_RE.test(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["exports", key], message: "not a valid variable name" });
      }
      if (/["\r\n]/.test(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["exports", key],
          message: "value must not contain double quotes or newlines"
        });
      }
    }
  });

export const ProvisionConfigSchema = z
  .object({
    brewfile: nonEmpty.optional(),
    taps: z.array(nonEmpty).default([]),
    formulae: z.array(nonEmpty).default([]),
    casks: z.array(nonEmpty).default([]),
    privilegedCasks: z.array(nonEmpty).default([]),
    appStoreApps: z.array(AppStoreAppSchema).default([]),
    editorExtensions: z.array(nonEmpty).default([]),
    settings: z.array(SettingSchema).default([]),
    dockAdd: z.array(nonEmpty).default([]),
    dockRemove: z.array(nonEmpty).default([]),
    dockReplace: z.array(DockReplaceSchema).default([]),
    identity: IdentitySchema.optional(),
    shell: ShellSchema.optional(),
    maintenance: z.boolean().default(false)
  })
  .strict();

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
