export * from "./env";
export * from "./plotwire-paths";
