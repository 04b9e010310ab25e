// Branded primitive types for type safety and domain modeling

// Frame counter - one per command consumed by the game loop
declare const FrameBrand: unique symbol;
export type Frame = number & { readonly [FrameBrand]: true };

// Frame constructors and guards
export function createFrame(value: number): Frame {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("Frame must be a non-negative integer");
  }
  return value as Frame;
}

export function isFrame(n: unknown): n is Frame {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

export const frameAsNumber = (f: Frame): number => f as number;

export function nextFrame(f: Frame): Frame {
  return (f + 1) as Frame;
}
