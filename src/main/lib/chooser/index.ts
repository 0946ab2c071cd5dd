export {
  type ChooserOptions,
  type ChooserOutcome,
  type ChooserState,
  DEFAULT_FINDER_COMMAND,
  FINDER_LAYOUT_ARGS,
  FINDER_MULTI_ARGS,
  interpretFinderResult,
  ParcelChooser,
  parseSelection,
} from "./chooser";
export {
  FINDER_EXIT_CODES,
  type FinderInvocation,
  type FinderPhase,
  type FinderResult,
  type FinderRunner,
  runFinderProcess,
} from "./finder";
export { buildPreviewCommand, resolveSelfCommand } from "./preview";
