export * from "./remote-api.types";
export * from "./http.remote-api";
