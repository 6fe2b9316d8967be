export function printHelp() {
    console.log(`
Usage:
  powerprof profile [--config <file>] [--duration <s>] [--interval <ms>] [--json] [--out <file>] [-v|-vv] [-- <cmd> [args...]]
  powerprof summarize <dataset.json> [--json]
  powerprof serve [--config <file>] [--port 8080] [--host 127.0.0.1] [-v|-vv]
  powerprof help

Commands:
  profile                Sample every configured power source while <cmd> runs,
                         or for --duration seconds, then print per-source statistics
  summarize              Print statistics of a dataset written by "profile --out"
  serve                  Sample until Ctrl-C and expose GET /status and GET /statistics

Options:
  --config <file>        JSON configuration (default: ./powerprof.config.json when present,
                         else RAPL only at 1000 ms)
  --duration <seconds>   Stop after this long (kills <cmd> if it is still running)
  --interval <ms>        Sampling interval of every source (default: config, else 1000)
  --json                 Print JSON output (machine-readable)
  --out <file>           Write every reading and fault to a dataset file

  --port <n>             serve: listening port (default: 8080)
  --host <addr>          serve: listening address (default: 127.0.0.1)

  -v / --verbose         Log monitor lifecycle to stderr
  -vv                    Also log every skipped tick

Environment:
  REDFISH_HOST, REDFISH_USERNAME, REDFISH_PASSWORD
                         Credentials of "redfish" sources that do not set them
  POWERPROF_LOG_LEVEL    Log level when no -v flag is given (fatal..trace, silent)
`);
}
