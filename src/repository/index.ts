export type { Repository, RepositoryOperation } from "./Repository";
export type { BranchConstructor } from "./ConcreteRepository";
export { ConcreteRepository } from "./ConcreteRepository";
