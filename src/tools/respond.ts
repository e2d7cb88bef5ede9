import { VirgoCXError } from "../errors.js";

export function jsonResult(data: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

/** Turns a client-side failure into a tool error; anything else propagates. */
export function errorResult(err: unknown) {
  if (err instanceof VirgoCXError) {
    return {
      content: [{ type: "text" as const, text: `Error: ${err.message}` }],
      isError: true,
    };
  }
  throw err;
}
