export * from "./cache.ts";
export * from "./channel.ts";
export * from "./list.ts";
export * from "./map.ts";
export * from "./set.ts";
export * from "./value.ts";
