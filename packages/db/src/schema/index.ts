export { knowledgeBases } from "./knowledge-bases.js";
export { ingestions } from "./ingestions.js";
