import { PatchMode } from './constants'
import type { JsonValue, Patch, PatchPayload, PatchRecord } from './types'

export function markup(html: string): PatchPayload {
  return { encoding: 'markup', markup: html }
}

export function structured(data: JsonValue): PatchPayload {
  return { encoding: 'structured', data }
}

export function updatePatch(target: number, mode: PatchMode, payload: PatchPayload): Patch {
  return { kind: 'update', target, mode, payload }
}

export function deletePatch(target: number): Patch {
  return { kind: 'delete', target }
}

/**
 * Attribute patches are applied to the parent element, so the component
 * itself never owns a DOM node of its own.
 */
export function targetsParent(mode: PatchMode): boolean {
  return mode === PatchMode.Attribute
}

/** Convert a patch to its wire record. */
export function toRecord(patch: Patch): PatchRecord {
  if (patch.kind === 'delete') {
    return { targetId: patch.target, mode: 'delete' }
  }
  const { payload } = patch
  return {
    targetId: patch.target,
    mode: patch.mode,
    encoding: payload.encoding,
    payload: payload.encoding === 'markup' ? payload.markup : payload.data,
  }
}
