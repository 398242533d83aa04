export { registerTopvisorTools } from "./topvisor.js";
export { registerAhrefsTools } from "./ahrefs.js";
export { registerPaperTools } from "./papers.js";
