/**
 * Scene Constants
 */

/**
 * Pause-mode bit flags. A node's flags are OR-ed with its ancestors' and
 * the tree's to decide whether it runs this tick.
 */
export const PauseMode = {
    /** Paused: skipped unless the node itself carries CONTINUE */
    TREE_PAUSED: 1 << 0,
    /** Never runs, and neither do its descendants */
    STOP: 1 << 1,
    /** Keeps running while the tree or an ancestor is paused */
    CONTINUE: 1 << 2,
    /** Default: no special handling */
    IGNORE: 1 << 3,
} as const;

/**
 * Decide whether a node runs its update given the accumulated pause state
 * and the node's own flags.
 */
export function shouldProcess(accumulated: number, own: number): boolean {
    if (accumulated & PauseMode.STOP) return false;
    if (accumulated & PauseMode.TREE_PAUSED) {
        return (own & PauseMode.CONTINUE) !== 0;
    }
    return true;
}
