/**
 * Outcome of removing one entity corner from a subtree.
 */
export type RemoveResult =
  /** No vertex at the position holds the id */
  | { kind: "notFound" }
  /** The id was dropped but other entities still share the vertex */
  | { kind: "idRemovedFromSharedVertex" }
  /** The vertex lost its last id and was dropped from its leaf */
  | { kind: "vertexFullyRemoved"; leafEmpty: boolean }
  /** The four children of a node were merged back into it */
  | { kind: "subnodesCollapsed" }
  /** A vertex was removed somewhere below and no further collapse applies */
  | { kind: "vertexRemoved" };

export const NOT_FOUND: RemoveResult = { kind: "notFound" };
export const ID_REMOVED: RemoveResult = { kind: "idRemovedFromSharedVertex" };
export const SUBNODES_COLLAPSED: RemoveResult = { kind: "subnodesCollapsed" };
export const VERTEX_REMOVED: RemoveResult = { kind: "vertexRemoved" };
