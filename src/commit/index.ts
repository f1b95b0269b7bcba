export { createCommit, formatCommit } from "./Commit";
