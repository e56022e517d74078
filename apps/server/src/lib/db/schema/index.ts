export * from "./preferences";
export * from "./social";
export * from "./users";
export * from "./verifications";
