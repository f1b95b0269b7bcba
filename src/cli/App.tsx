import type { BranchworkConfig } from "../config";

import React, { useMemo } from "react";
import { RepositoryComponent } from "./RepositoryComponent";
import { constructRepository } from "../shared/constructRepository";

interface Props {
  config: BranchworkConfig;
}

const App: React.FC<Props> = ({ config }) => {
  const repository = useMemo(() => constructRepository(config), [config]);

  return <RepositoryComponent repository={repository} />;
};

export default App;
