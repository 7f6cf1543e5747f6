/**
 * Debug messages (`dbg`) attached to failed responses
 */
export const resNotExists = "resource does not exist"
export const targetMissing = "no target resource id or structured path"
export const transitDisabled = "transit requests are disabled"
export const noPrivilege = "originator has no privilege"
export const missingContentType = "missing content type or resource type"
export const malformedContent = "malformed content or resource type mismatch"
export const resourceExists = "resource already exists"
export const readOnlyResource = "resource is read-only"
export const deregistrationFailed = "deregistration of the resource failed"
export const invalidArguments = "invalid or unsupported arguments"
export const invalidResultContent = "unsupported result content"
export const targetNotReachable = "remote CSE is not reachable"

export const invalidChildType = (parent: string, child: string) =>
  `${child} is not an allowed child type of ${parent}`
export const noInstance = (name: string) => `no instance for <${name}>`
export const operationNotAllowedFor = (name: string) =>
  `operation not allowed for <${name}> resource type`
