export { createRealExecutor } from "./real-executor"
export { createPrintExecutor } from "./print-executor"
export { formatCommand, quoteToken } from "./command-format"
