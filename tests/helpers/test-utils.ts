// Awaits a promise that must reject with `type` and returns the typed error
export async function captureError<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise
  } catch (error) {
    if (error instanceof type) {
      return error
    }
    throw error
  }

  throw new Error(`Expected promise to reject with ${type.name}`)
}
