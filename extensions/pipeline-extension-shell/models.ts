import { z } from "zod";

export const authSchema = z.object({
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  ssh_key: z.string().optional(),
  headers: z.record(z.string()).optional()
});

export const isolationSchema = z.object({
  type: z.enum(["host", "container"]).default("host"),
  base_image: z.string().min(1).optional()
});

export const scriptSchema = z.object({
  // Written inside the run's download directory.
  file: z.string().min(1).refine(f => !f.split(/[\\/]/).includes(".."), {
    message: "Script file must stay inside the download directory"
  }),
  type: z.string().min(1),
  location: z.string().min(1),
  auth: authSchema.nullish().transform(v => v ?? undefined)
});

export const shellRunSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default("bash"),
  isolation: isolationSchema.nullish().transform(v => v ?? undefined),
  commands: z.array(z.string()).nullish().transform(v => v ?? []),
  scripts: z.array(scriptSchema).nullish().transform(v => v ?? [])
}).refine(r => r.commands.length > 0 || r.scripts.length > 0, {
  message: "Either scripts or commands must be provided"
});

export type ShellIsolation = z.infer<typeof isolationSchema>;
export type ShellScript = z.infer<typeof scriptSchema>;
export type ShellRun = z.infer<typeof shellRunSchema>;

export const DEFAULT_BASE_IMAGE = "ubuntu:22.04";
