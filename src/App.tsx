import type { ChangeEvent, ReactNode } from 'react';
import { Eraser, Save, FolderOpen, Download, Upload } from 'lucide-react';
import clsx from 'clsx';
import { saveAs } from 'file-saver';
import { useGrid } from './hooks/useGrid';
import { GridCanvas } from './components/GridCanvas';
import { defaultConfig, type GridConfig } from './config';
import { describeError } from './grid/errors';
import type { GridStorage } from './grid/storage';
import { countOn } from './utils/textRenderer';

interface AppProps {
  storage: GridStorage;
  config?: GridConfig;
}

function App({ storage, config = defaultConfig }: AppProps) {
  const {
    height,
    cells,
    error,
    toggle,
    clear,
    save,
    load,
    importFile,
    exportText
  } = useGrid({ height: config.height, storage });

  const handleExport = () => {
    const blob = new Blob([exportText()], { type: 'application/json' });
    saveAs(blob, 'toggle_grid.json');
  };

  const handleImport = async (e: ChangeEvent<HTMLInputElement>) => {
    const input = e.currentTarget;
    const file = input.files?.[0];
    if (!file) return;

    // Failures land in `error` and show below the canvas
    await importFile(file);

    // Reset input so the same file can be picked again
    input.value = '';
  };

  return (
    <div className="app">
      <header className="toolbar">
        <h1 className="title">Toggle Grid</h1>

        <div className="toolbar-group">
          <ToolbarBtn icon={<Eraser size={16} />} label="Clear" onClick={clear} />
          <div className="divider" />
          <ToolbarBtn icon={<Save size={16} />} label="Save" onClick={() => save(config.storageKey)} />
          <ToolbarBtn icon={<FolderOpen size={16} />} label="Load" onClick={() => load(config.storageKey)} />
          <div className="divider" />
          <ToolbarBtn icon={<Download size={16} />} label="Export" onClick={handleExport} primary />
          <label className="btn">
            <Upload size={16} /> Import
            <input type="file" accept=".json" className="hidden" onChange={e => void handleImport(e)} />
          </label>
        </div>
      </header>

      <main className="workspace">
        <GridCanvas cells={cells} cellSize={config.cellSize} onToggle={toggle} />

        <div className="status">
          {`${countOn(cells)} / ${height} on`}
        </div>

        {error && (
          <p role="alert" className="error">
            {describeError(error)}
          </p>
        )}
      </main>
    </div>
  );
}

interface ToolbarBtnProps {
  icon: ReactNode;
  label: string;
  onClick: () => void;
  primary?: boolean;
}

function ToolbarBtn({ icon, label, onClick, primary = false }: ToolbarBtnProps) {
  return (
    <button
      type="button"
      onClick={onClick}
      title={label}
      className={clsx('btn', primary && 'btn-primary')}
    >
      {icon} {label}
    </button>
  );
}

export default App
