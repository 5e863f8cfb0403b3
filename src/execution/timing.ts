/** Largest delay a Node timer honours; longer delays fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

export type Deadline = {
  remainingMs: () => number
  expired: () => boolean
}

export type Clock = {
  now: () => number
  sleep: (ms: number) => Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await new Promise<void>((resolve) => {
      setTimeout(resolve, ms)
    })
  },
}

export const createDeadline = (clock: Clock, timeoutMs: number): Deadline => {
  const startedAt = clock.now()
  const remainingMs = (): number => Math.max(0, timeoutMs - (clock.now() - startedAt))

  return {
    remainingMs,
    expired: () => remainingMs() <= 0,
  }
}

export type RaceResult<T> = { settled: true; value: T } | { settled: false }

/**
 * Waits for `work` for at most `ms`. When the timer wins, `onTimeout` runs (used to abort the
 * underlying request) and the race reports `settled: false`; a later rejection of `work`
 * is absorbed by the race and never surfaces as an unhandled rejection.
 */
export const raceWithTimeout = async <T>(
  work: Promise<T>,
  ms: number,
  onTimeout?: () => void
): Promise<RaceResult<T>> => {
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<RaceResult<T>>((resolve) => {
    timer = setTimeout(() => {
      onTimeout?.()
      resolve({ settled: false })
    }, Math.min(ms, MAX_TIMER_DELAY_MS))
  })

  try {
    return await Promise.race([
      work.then((value): RaceResult<T> => ({ settled: true, value })),
      timeout,
    ])
  } finally {
    clearTimeout(timer)
  }
}
