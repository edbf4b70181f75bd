/**
 * Configuration Schema Module
 *
 * Zod schemas for the project config file and for the parts of the package
 * manifest the finder reads.
 */

import { z } from 'zod';

// =============================================================================
// Project config file (.msrv-finder.yml)
// =============================================================================

const BoundSchema = z.union([z.string(), z.number().int()]).transform(String);

export const ProjectConfigSchema = z
  .object({
    /** Check command as argument tokens, e.g. ['cargo', 'test'] */
    check_command: z.array(z.string().min(1)).min(1).optional(),
    /** Quoted bare version or edition year; YAML reads an unquoted 1.60 as 1.6 */
    min: BoundSchema.optional(),
    max: BoundSchema.optional(),
    /** false selects linear search */
    bisect: z.boolean().optional(),
    include_all_patch_releases: z.boolean().optional(),
    target: z.string().min(1).optional(),
    ignore_lockfile: z.boolean().optional(),
    /** Remove each toolchain once its check has run */
    uninstall_toolchains: z.boolean().optional(),
    release_index_ttl_hours: z.number().nonnegative().optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// =============================================================================
// Package manifest (Cargo.toml)
// =============================================================================

/** `key.workspace = true` inherits the value from [workspace.package] */
const WorkspaceInherited = z.object({ workspace: z.literal(true) });

const InheritableString = z.union([z.string(), WorkspaceInherited]);

export const PackageSectionSchema = z.object({
  name: z.string().optional(),
  edition: InheritableString.optional(),
  'rust-version': InheritableString.optional(),
  metadata: z
    .object({
      msrv: z.string().optional(),
    })
    .optional(),
});

export const ManifestSchema = z.object({
  package: PackageSectionSchema.optional(),
  workspace: z
    .object({
      package: z
        .object({
          edition: z.string().optional(),
          'rust-version': z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

export type ManifestDocument = z.infer<typeof ManifestSchema>;

// =============================================================================
// Issue formatting
// =============================================================================

/**
 * Renders validation issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map((segment) => String(segment)).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
