/**
 * Resource path synthesis.
 *
 * Paths are built, never created: the driver provisions them when the
 * task runs. Every path embeds the task slug and the invocation id so
 * that concurrent resolutions sharing one tmp root cannot collide.
 */

import { join } from "node:path";
import type { ResourceType } from "../schemas/tool-contract.js";
import type { ResolvedResource } from "../schemas/resolved-tool-contract.js";

export interface ResourceContext {
  toolContractId: string;
  invocationId: string;
  tmpDir: string;
  logDir: string;
}

/** "ns.tasks.filter_fasta" → "ns-filter_fasta" */
export function taskSlug(toolContractId: string): string {
  return toolContractId.replace(/\.tasks\./, "-").replace(/[^A-Za-z0-9_-]/g, "_");
}

/** Per-invocation scratch root under tmpDir. */
export function invocationRoot(ctx: ResourceContext): string {
  return join(ctx.tmpDir, `${taskSlug(ctx.toolContractId)}-${ctx.invocationId}`);
}

/**
 * Map each requested resource to a concrete path. The request's index is
 * part of the name, so repeated requests get distinct paths in order.
 */
export function synthesizeResources(requests: readonly ResourceType[], ctx: ResourceContext): ResolvedResource[] {
  const root = invocationRoot(ctx);
  return requests.map((type, i): ResolvedResource => {
    switch (type) {
      case "$tmpdir":
        return [type, join(root, `tmpdir-${i}`)];
      case "$tmpfile":
        return [type, join(root, `tmpfile-${i}.tmp`)];
      case "$logfile":
        return [type, join(ctx.logDir, `${taskSlug(ctx.toolContractId)}-${ctx.invocationId}.log`)];
    }
  });
}
