import { Context, Layer } from "effect"

import { greet } from "../../core/greeting.js"

export class Greeter extends Context.Tag("Greeter")<
  Greeter,
  {
    readonly greet: (name: string) => string
  }
>() {}

export const GreeterLive = Layer.succeed(Greeter, { greet })
