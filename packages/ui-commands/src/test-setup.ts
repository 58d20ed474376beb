import { configure, getConsoleSink } from "@logtape/logtape"

// Configure LogTape for tests: records only reach the console when they are
// flagged with a `debug` property, so fatal paths exercised on purpose stay quiet
await configure({
  sinks: {
    console: getConsoleSink(),
  },
  loggers: [
    {
      category: ["editor-bridge"],
      lowestLevel: "trace",
      sinks: ["console"],
      filters: ["flagged"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],

  filters: {
    flagged: record => record.properties.debug === true,
  },
})
