import type { BranchworkConfig } from "../config";
import type { Repository } from "../repository";

import { ConcreteRepository } from "../repository";

export function constructRepository({
  repositoryName,
  defaultBranch,
}: BranchworkConfig): Repository {
  const repository = new ConcreteRepository(repositoryName);
  repository.createBranch(defaultBranch);
  return repository;
}
