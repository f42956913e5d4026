import type { Context } from './context';

/**
 * How the active view tells the loop what to do before the next frame.
 * `change` hands ownership of `view` to the loop.
 */
export type ViewAction =
    | { type: 'none' }
    | { type: 'quit' }
    | { type: 'change'; view: View };

export const ViewAction = {
    none: (): ViewAction => ({ type: 'none' }),
    quit: (): ViewAction => ({ type: 'quit' }),
    change: (view: View): ViewAction => ({ type: 'change', view }),
};

export interface View {
    // Called when this view becomes the active, rendered view.
    resume?(context: Context): void;
    // Called when this view stops being the active view.
    pause?(context: Context): void;
    // Called once per frame to advance the view by `elapsed` seconds and draw it.
    render(context: Context, elapsed: number): ViewAction;
}
