import { describeHandlerContract } from "../../../ports/__tests__/handler.contract"
import { directoryFileHarness, fileHarness } from "./file-harness"

describeHandlerContract(fileHarness())
describeHandlerContract(directoryFileHarness())
