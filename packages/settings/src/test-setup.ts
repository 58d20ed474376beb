import { configure, getConsoleSink } from "@logtape/logtape"

// Registry diagnostics stay out of test output unless flagged with `debug`
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
