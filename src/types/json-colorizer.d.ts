// json-colorizer 2.x ships no type declarations.
declare module "json-colorizer" {
  interface ColorizeOptions {
    pretty?: boolean
    colors?: Record<string, string>
  }
  function colorize(json: string | object, options?: ColorizeOptions): string
  export = colorize
}
