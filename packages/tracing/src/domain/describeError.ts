/**
 * Type name of a thrown or failed value: the tag of a tagged error, the class name of an
 * Error, otherwise the JavaScript type of the value.
 */
export const errorTypeName = (error: unknown): string => {
  if (typeof error === "object" && error !== null) {
    if ("_tag" in error && typeof error._tag === "string") {
      return error._tag
    }
    const ctorName = error.constructor?.name
    if (ctorName && ctorName !== "Object") {
      return ctorName
    }
    if (error instanceof Error) {
      return error.name
    }
    return "Object"
  }
  return typeof error
}

export const errorMessageOf = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message
  }
  return String(error)
}

export const errorStackOf = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined
