export type { SweepRow } from "./sweepParameter";

export { sweepParameter } from "./sweepParameter";
