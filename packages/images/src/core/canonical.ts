import type { OperationSet, OperationSpec } from "../operations/schema.js"

type CanonicalParam = [key: string, value: string | number]
type CanonicalOperation = [name: string, params: CanonicalParam[]]

function canonicalParams(op: OperationSpec): CanonicalParam[] {
  const params: CanonicalParam[] = []
  switch (op.name) {
    case "grayscale":
    case "remove_background":
      break
    case "blur":
      params.push(["radius", op.radius])
      break
    case "rotate":
      params.push(["angle", op.angle])
      break
    case "resize":
      params.push(["mode", op.mode])
      if (op.mode === "free") {
        if (op.width !== undefined) params.push(["width", op.width])
        if (op.height !== undefined) params.push(["height", op.height])
      } else if (op.width !== undefined) {
        // the height is ignored when a width drives the resize
        params.push(["width", op.width])
      } else if (op.height !== undefined) {
        params.push(["height", op.height])
      }
      break
  }
  return params.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

/**
 * Serialize an operation set as an ordered list of
 * `[name, [[key, value], ...]]` with parameter keys sorted.
 *
 * Parameter order inside an operation never matters; operation order does.
 */
export function canonicalizeOperations(operations: OperationSet): string {
  const canonical: CanonicalOperation[] = operations.map(op => [op.name, canonicalParams(op)])
  return JSON.stringify(canonical)
}
