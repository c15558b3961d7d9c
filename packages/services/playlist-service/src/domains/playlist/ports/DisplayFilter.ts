/** Row visibility predicate applied by traversal at read time */
export type DisplayFilter = (row: number) => boolean;
