export * from "./tenant";
export * from "./util/LoggerCommon";
