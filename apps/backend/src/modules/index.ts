// Cache module
export * from "./cache";
// Functions module
export * from "./functions";
// Security module
export * from "./security";
