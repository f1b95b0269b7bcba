export { OperationLog } from "./OperationLog";
