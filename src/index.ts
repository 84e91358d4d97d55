export * from "./annotation";
export * from "./archive";
export * from "./class-map";
export * from "./convert";
export * from "./fs";
export * from "./geometry";
export * from "./group";
export * from "./label";
export * from "./rng";
export * from "./split";
export * from "./yaml";
