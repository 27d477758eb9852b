/**
 * Collects cleanup steps and runs them the first time the returned function
 * is called. Later calls do nothing and return false.
 */
export function createTeardown(...steps: Array<() => void>): () => boolean {
  let done = false;
  return () => {
    if (done) {
      return false;
    }
    done = true;
    for (const step of steps) {
      step();
    }
    return true;
  };
}
