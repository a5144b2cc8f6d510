import { describeHandlerContract } from "../../../ports/__tests__/handler.contract"
import { pinoHarness } from "./pino-harness"

describeHandlerContract(pinoHarness())
