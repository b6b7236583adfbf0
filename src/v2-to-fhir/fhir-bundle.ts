/**
 * FHIR transaction bundle entry construction.
 *
 * Resources are whatever the specifications built, so they are typed as
 * open records carrying resourceType and id rather than per-kind FHIR types.
 */

import type { FinalizedResource } from "../mapping/assembler";
import type { FragmentRecord } from "../mapping/resource-instance";

export type Resource = FragmentRecord & {
  resourceType: string;
  id?: string;
};

export interface BundleEntry {
  resource: Resource;
  request: {
    method: "PUT" | "POST";
    url: string;
  };
}

export interface Bundle {
  resourceType: "Bundle";
  type: "transaction";
  entry: BundleEntry[];
}

export function createBundleEntry(resource: Resource, method: "PUT" | "POST" = "PUT"): BundleEntry {
  const resourceType = resource.resourceType;
  const id = resource.id;

  return {
    resource,
    request: {
      method,
      url: id ? `${resourceType}/${id}` : `${resourceType}`,
    },
  };
}

export function toResource({ kind, id, attributes }: FinalizedResource): Resource {
  return { resourceType: kind, id, ...attributes };
}

export function toTransactionBundle(resources: readonly FinalizedResource[]): Bundle {
  return {
    resourceType: "Bundle",
    type: "transaction",
    entry: resources.map((resource) => createBundleEntry(toResource(resource))),
  };
}
