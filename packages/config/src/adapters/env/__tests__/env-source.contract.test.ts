import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async (_cwd, settings) => ({
    source: new EnvSource({
      env: {
        LOG_LEVEL: settings.level,
        LOG_FORCE_UTC: String(settings.forceUtc),
        HOME: "/home/test",
      },
    }),
  }),
  setup: async () => {},
})
