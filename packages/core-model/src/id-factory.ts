import { randomUUID } from "node:crypto";

export const makeRandomId = () => randomUUID();

/** Sequential ids with a fixed prefix; used for fixtures and Markdown imports. */
export const createSequentialIdFactory = (prefix = "b") => {
  let index = 0;
  return () => {
    index += 1;
    return `${prefix}${index}`;
  };
};
