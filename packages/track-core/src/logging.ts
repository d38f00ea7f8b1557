export type Logger = Pick<Console, "info" | "warn" | "error">;
