/**
 * Resource type codes (`ty`)
 *
 * Negative values are CSE-internal virtual resources that have no code in the
 * protocol. They are never accepted from a client request.
 */
export enum M2MType {
  /**
   * Access Control Policy
   */
  AccessControlPolicy = 1,
  /**
   * Application Entity
   */
  ApplicationEntity = 2,
  /**
   * Container
   */
  Container = 3,
  /**
   * Content Instance
   */
  ContentInstance = 4,
  /**
   * CSE(Common Service Entity) Base
   */
  CSEBase = 5,
  /**
   * Group
   */
  Group = 9,
  /**
   * Remote CSE (registration record of another CSE)
   */
  RemoteCSE = 16,
  /**
   * Subscribe
   */
  Subscribe = 23,
  /**
   * `<latest>` of a container
   */
  ContainerLatest = -20001,
  /**
   * `<oldest>` of a container
   */
  ContainerOldest = -20002,
  /**
   * `<fanOutPoint>` of a group
   */
  GroupFanOutPoint = -20005,
}

export type DateString = string

/**
 * Root key of a resource representation. (`m2m:cnt` ...)
 */
export const M2MTypeTag: Readonly<Record<M2MType, string>> = {
  [M2MType.AccessControlPolicy]: "m2m:acp",
  [M2MType.ApplicationEntity]: "m2m:ae",
  [M2MType.Container]: "m2m:cnt",
  [M2MType.ContentInstance]: "m2m:cin",
  [M2MType.CSEBase]: "m2m:cb",
  [M2MType.Group]: "m2m:grp",
  [M2MType.RemoteCSE]: "m2m:csr",
  [M2MType.Subscribe]: "m2m:sub",
  [M2MType.ContainerLatest]: "m2m:la",
  [M2MType.ContainerOldest]: "m2m:ol",
  [M2MType.GroupFanOutPoint]: "m2m:fopt",
}

export const m2mTypes: readonly M2MType[] = [
  M2MType.AccessControlPolicy,
  M2MType.ApplicationEntity,
  M2MType.Container,
  M2MType.ContentInstance,
  M2MType.CSEBase,
  M2MType.Group,
  M2MType.RemoteCSE,
  M2MType.Subscribe,
  M2MType.ContainerLatest,
  M2MType.ContainerOldest,
  M2MType.GroupFanOutPoint,
]

/**
 * Find the type of a root key. `undefined` if unknown.
 */
export function typeOfTag(tag: string): M2MType | undefined {
  return m2mTypes.find((ty) => M2MTypeTag[ty] === tag)
}

export function isM2MType(value: number): value is M2MType {
  return m2mTypes.some((ty) => ty === value)
}

/**
 * Types living only inside a container: `<latest>`, `<oldest>`
 *
 * They never show up in a tree or reference result.
 */
export const latestOldestTypes: readonly M2MType[] = [
  M2MType.ContainerLatest,
  M2MType.ContainerOldest,
]

/**
 * Access control operations (`acop` bits)
 */
export enum M2MPermission {
  NONE = 0,
  CREATE = 1,
  RETRIEVE = 2,
  UPDATE = 4,
  DELETE = 8,
  NOTIFY = 16,
  DISCOVERY = 32,
  ALL = 63,
}

/**
 * Filter Usage (`fu`)
 */
export enum FilterUsage {
  DISCOVERY = 1,
  CONDITIONAL_RETRIEVAL = 2,
}

/**
 * Filter Operation (`fo`)
 */
export enum FilterOperation {
  AND = 1,
  OR = 2,
}

/**
 * Desired Identifier Result Type (`drt`)
 */
export enum DesiredIdentifierResultType {
  STRUCTURED = 1,
  UNSTRUCTURED = 2,
}

/**
 * Result Content (`rcn`)
 */
export enum ResultContent {
  NOTHING = 0,
  ATTRIBUTES = 1,
  HIERARCHICAL_ADDRESS = 2,
  HIERARCHICAL_ADDRESS_ATTRIBUTES = 3,
  ATTRIBUTES_AND_CHILD_RESOURCES = 4,
  ATTRIBUTES_AND_CHILD_RESOURCE_REFERENCES = 5,
  CHILD_RESOURCE_REFERENCES = 6,
  ORIGINAL_RESOURCE = 7,
  CHILD_RESOURCES = 8,
  MODIFIED_ATTRIBUTES = 9,
}
