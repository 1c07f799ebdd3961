declare module 'JSONSelect' {
  export function match(selector: string, object: unknown): unknown[];
}
