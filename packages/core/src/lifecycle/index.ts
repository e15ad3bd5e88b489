export * from "./poll";
export * from "./lifecycle.client";
export * from "./before-each.callback";
