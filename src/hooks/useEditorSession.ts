import { useCallback, useEffect, useState, useSyncExternalStore } from "react";
import type { EditorConfig } from "../canvas/config";
import { InteractionDispatcher } from "../canvas/dispatcher";
import { createCanvasMeasurer } from "../canvas/geometry";
import { EditorSession } from "../canvas/session";
import type { EditorEvent, Gesture, TextHistoryMode, TextMeasurer } from "../canvas/types";

export type EditorHandle = {
  session: EditorSession;
  dispatcher: InteractionDispatcher;
};

export type EditEvent = Exclude<EditorEvent, { type: "change" }>;

export function createEditor(measure: TextMeasurer, config?: Partial<EditorConfig>): EditorHandle {
  const session = new EditorSession({ measure, config });
  return { session, dispatcher: new InteractionDispatcher(session) };
}

/** One editor for the lifetime of the component, measured with a 2D canvas. */
export function useEditorSession(
  textHistory: TextHistoryMode,
  onEditEvent?: (event: EditEvent) => void,
) {
  const [editor] = useState(() => createEditor(createCanvasMeasurer(), { textHistory }));

  useEffect(() => {
    editor.session.setTextHistory(textHistory);
  }, [editor, textHistory]);

  useEffect(() => {
    if (!onEditEvent) return;
    return editor.session.subscribe((event) => {
      if (event.type !== "change") onEditEvent(event);
    });
  }, [editor, onEditEvent]);

  const view = useSyncExternalStore(editor.session.subscribe, editor.session.getView);

  const dispatch = useCallback(
    (gesture: Gesture) => editor.dispatcher.dispatch(gesture),
    [editor],
  );

  return { view, dispatch, config: editor.session.config } as const;
}
