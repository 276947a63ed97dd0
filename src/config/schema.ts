import { z } from 'zod';

// Every key is optional: a file only sets what it wants to override.
export const ConfigFileSchema = z.object({
  output: z
    .object({
      open: z.boolean().optional(),
      print: z.boolean().optional(),
      copy: z.boolean().optional(),
      json: z.boolean().optional(),
      plain: z.boolean().optional(),
      dry_run: z.boolean().optional(),
      verbose: z.boolean().optional(),
    })
    .optional(),
  parse: z
    .object({
      calendar: z.string().optional(),
      note: z.string().optional(),
      add: z.boolean().optional(),
    })
    .optional(),
  applescript: z
    .object({
      add: z.boolean().optional(),
      run: z.boolean().optional(),
      print: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Layered configuration before built-in defaults are applied. */
export interface PartialConfig {
  output: {
    open?: boolean;
    print?: boolean;
    copy?: boolean;
    json?: boolean;
    plain?: boolean;
    dry_run?: boolean;
    verbose?: boolean;
  };
  parse: {
    calendar?: string;
    note?: string;
    add?: boolean;
  };
  applescript: {
    add?: boolean;
    run?: boolean;
    print?: boolean;
  };
}

/** Configuration with every default filled in. */
export interface ResolvedConfig {
  output: {
    open: boolean;
    print: boolean;
    copy: boolean;
    json: boolean;
    plain: boolean;
    dry_run: boolean;
    verbose: boolean;
  };
  parse: {
    calendar: string;
    note: string;
    add: boolean;
  };
  applescript: {
    add: boolean;
    run: boolean;
    print: boolean;
  };
}
