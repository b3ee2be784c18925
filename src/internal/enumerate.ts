import { Array as Arr } from "effect"

/**
 * Renders items as an English list: `a`, `a or b`, `a, b, or c`.
 */
export const enumerate = <A>(items: Arr.NonEmptyReadonlyArray<A>, render: (item: A) => string): string => {
  if (items.length === 1) {
    return render(Arr.headNonEmpty(items))
  }
  const init = Arr.initNonEmpty(items).map(render).join(", ")
  const last = render(Arr.lastNonEmpty(items))
  return items.length === 2 ? `${init} or ${last}` : `${init}, or ${last}`
}
