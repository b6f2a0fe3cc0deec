import { useCallback, useEffect } from "react";
import Canvas from "./components/Canvas";
import Menu from "./components/Menu";
import Toolbar from "./components/Toolbar";
import { log } from "./canvas/logger";
import { getBackgroundColor, isDarkTheme } from "./canvas/rendering";
import { useEditorSession, type EditEvent } from "./hooks/useEditorSession";
import { useKeyboardShortcuts } from "./hooks/useKeyboardShortcuts";
import useSettings from "./hooks/useSettings";

export default function App() {
  const [settings, updateSettings] = useSettings();
  const isDark = isDarkTheme(settings.theme);

  const onEditEvent = useCallback((event: EditEvent) => {
    log.debug(event.type, event.elementId);
  }, []);

  const { view, dispatch, config } = useEditorSession(settings.textHistory, onEditEvent);

  useKeyboardShortcuts(dispatch, {
    editing: view.editSession !== null,
    fontSizeStep: config.fontSizeStep,
  });

  useEffect(() => {
    document.body.style.background = getBackgroundColor(settings.theme);
  }, [settings.theme]);

  return (
    <div className="fixed inset-0">
      <Menu settings={settings} updateSettings={updateSettings} isDark={isDark} />
      <Canvas view={view} config={config} theme={settings.theme} dispatch={dispatch} />
      <Toolbar view={view} config={config} isDark={isDark} dispatch={dispatch} />
    </div>
  );
}
