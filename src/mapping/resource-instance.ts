/**
 * Output values spliced into resources. A fragment is plain data: a scalar,
 * a structured record, or a list of either. References are records of the
 * form `{ reference: "Kind/id" }`.
 */
export type Scalar = string | number | boolean;

export type Fragment = Scalar | FragmentRecord | Fragment[];

export interface FragmentRecord {
  [attribute: string]: Fragment;
}

/**
 * One resource under construction. Identity is assigned when the shell is
 * created and never changes; attributes fill in as expressions evaluate.
 */
export class ResourceInstance {
  readonly attributes: FragmentRecord = {};

  constructor(
    readonly kind: string,
    readonly id: string,
  ) {}

  get reference(): string {
    return `${this.kind}/${this.id}`;
  }

  /** The resource as FHIR JSON: resourceType and id first, then attributes in splice order. */
  toJSON(): FragmentRecord {
    return { resourceType: this.kind, id: this.id, ...this.attributes };
  }
}

/**
 * Put fragments into a record attribute. List attributes append in
 * production order; a single-valued attribute keeps the first value it got.
 * Fragments are copied so two owners never share one object.
 */
export function spliceFragments(
  record: FragmentRecord,
  attribute: string,
  fragments: readonly Fragment[],
  asList: boolean,
): void {
  if (fragments.length === 0) return;

  const current = record[attribute];
  const copies = fragments.map((fragment) => structuredClone(fragment));

  if (asList || Array.isArray(current)) {
    const list = Array.isArray(current) ? current : current === undefined ? [] : [current];
    list.push(...copies);
    record[attribute] = list;
    return;
  }

  const first = copies[0];
  if (current === undefined && first !== undefined) {
    record[attribute] = first;
  }
}
