import * as Position from "../Position.js"

/**
 * What to draw under the anchor column: the fixed `^---` point marker, or a
 * range marker as wide as the span it underlines.
 */
export type Marker =
  | { readonly _tag: "Point" }
  | { readonly _tag: "Range"; readonly width: number }

export const underline = (marker: Marker, offset: number): string => {
  const padding = " ".repeat(Math.max(0, offset))
  switch (marker._tag) {
    case "Point":
      return `${padding}^---`
    case "Range":
      return marker.width > 1 ? `${padding}^${"-".repeat(marker.width - 2)}^` : `${padding}^`
  }
}

/**
 * Boxed source-context block:
 *
 * ```text
 *  --> 2:2
 *   |
 * 2 | cd
 *   |  ^---
 *   |
 *   = expected 1 or 2
 * ```
 */
export const report = (anchor: Position.Position, marker: Marker, message: string): string => {
  const [line, column] = Position.lineCol(anchor)
  const gutter = " ".repeat(String(line).length)
  return [
    `${gutter}--> ${line}:${column}`,
    `${gutter} |`,
    `${line} | ${Position.lineOf(anchor)}`,
    `${gutter} | ${underline(marker, column - 1)}`,
    `${gutter} |`,
    `${gutter} = ${message}`,
  ].join("\n")
}
