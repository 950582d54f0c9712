export { type ConfigInitOptions, configInit, configShow } from "./config/index";
export { type JsonOptions, json } from "./json";
export { type ListOptions, list } from "./list";
export { type ScriptOptions, script } from "./script";
