export * from "./core/cli-error.js"
export * from "./core/command.js"
export * from "./core/greeting.js"
export * from "./core/help.js"
export * from "./core/proverbs.js"
export * from "./core/suggest.js"
export * from "./core/version.js"
export * from "./shell/cli.js"
export * from "./shell/services/build-info.js"
export * from "./shell/services/file-system.js"
export * from "./shell/services/greeter.js"
export * from "./shell/services/proverb-provider.js"
export * from "./shell/services/proverb-resource.js"
export * from "./shell/services/runtime-env.js"
