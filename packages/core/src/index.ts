export * from "./charsets";
export * from "./errors";
export * from "./random";
export * from "./generator";
export * from "./passphrase";
export * from "./entropy";
export * from "./detectors";
export * from "./scoring";
export * from "./policy";
export * from "./analyzer";
export * from "./report";
export * from "./export";
