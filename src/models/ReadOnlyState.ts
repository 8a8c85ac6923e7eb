/**
 * Lock state of an OrderedList.
 *
 * `Unset` may leave exactly once, either through an explicit external
 * `setReadOnly()` or by collapsing to `Unlocked` on the first mutation.
 */
export enum ReadOnlyState {
  Unset = "unset",
  Unlocked = "unlocked",
  Locked = "locked",
}

export type SettledReadOnlyState = Exclude<ReadOnlyState, ReadOnlyState.Unset>;

export function readOnlyStateOf(value: boolean): SettledReadOnlyState {
  return value ? ReadOnlyState.Locked : ReadOnlyState.Unlocked;
}

export function collapseReadOnlyState(
  state: ReadOnlyState,
): SettledReadOnlyState {
  return state === ReadOnlyState.Unset ? ReadOnlyState.Unlocked : state;
}
