/**
 * Hands out identifiers for backends whose platform does not assign any.
 */
export const createSequencer = (prefix: string, initial = 0) => {
  let curr = initial;

  return {
    next() {
      curr += 1;
      return `${prefix}-${curr}`;
    },
  };
};

export type Sequencer = ReturnType<typeof createSequencer>;
