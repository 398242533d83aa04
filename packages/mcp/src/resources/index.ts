export { registerPaperResources, FOLDERS_URI } from "./papers.js";
