export * from "./cache/AddressDecoder";
export * from "./cache/CacheConfig";
export * from "./cache/CachePresets";
export * from "./cache/CacheModel";
export * from "./cache/CacheSet";
export * from "./cache/CacheStatistics";
export * from "./cache/CacheTypes";
export * from "./cache/ReplacementPolicy";
export * from "./cache/WritePolicyEngine";
export * from "./memory/BackingStore";
export * from "./memory/MainMemory";
export * from "./exceptions/CacheExceptions";
export * from "./tools/accessLogger";
export * from "./util/RandomStream";
