import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async (_cwd, settings) => ({
    source: new ObjectSource({ ...settings }, "object:contract"),
  }),
  setup: async () => {},
})
