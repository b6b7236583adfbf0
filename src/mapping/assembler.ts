/**
 * Resource & bundle assembly for one conversion run.
 *
 * A shell (kind + id) exists before any of its attributes are evaluated.
 * It becomes visible to `$Kind` lookups only once `register` is called at the
 * end of its immediate pass, so a half-built resource is never a join
 * candidate. The final bundle lists instances in creation order.
 */

import type { IdGenerator } from "../v2-to-fhir/id-generation";
import { ResourceInstance, type FragmentRecord } from "./resource-instance";

export interface FinalizedResource {
  kind: string;
  id: string;
  attributes: FragmentRecord;
}

export class BundleAssembler {
  private readonly created: ResourceInstance[] = [];
  private readonly registered = new Map<string, ResourceInstance[]>();

  constructor(private readonly nextId: IdGenerator) {}

  createShell(kind: string): ResourceInstance {
    const instance = new ResourceInstance(kind, this.nextId(kind));
    this.created.push(instance);
    return instance;
  }

  register(instance: ResourceInstance): void {
    const list = this.registered.get(instance.kind);
    if (list) {
      if (!list.includes(instance)) list.push(instance);
    } else {
      this.registered.set(instance.kind, [instance]);
    }
  }

  instancesOf(kind: string): readonly ResourceInstance[] {
    return this.registered.get(kind) ?? [];
  }

  finalizedBundle(): FinalizedResource[] {
    return this.created.map((instance) => ({
      kind: instance.kind,
      id: instance.id,
      attributes: structuredClone(instance.attributes),
    }));
  }
}
