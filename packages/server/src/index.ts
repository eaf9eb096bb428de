export * from "./content.js";
export * from "./stdio.js";
export * from "./http-server.js";
