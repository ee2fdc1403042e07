import { isErr } from "option-t/plain_result";
import { useMemo, useState } from "preact/hooks";
import { mapTagToRuntime } from "../config/mapping.ts";
import {
  type ChannelNode,
  createProject,
  type DeviceNode,
  findNode,
  type FoundNode,
  type NodeKind,
  type Project,
  removeNode,
  type TagEntry,
  walkTags,
} from "../config/project.ts";
import {
  exportProjectJson,
  exportTagsCsv,
  importProjectJson,
  importTagsCsv,
} from "../config/serializers.ts";
import { WriteValueDialog } from "../dialogs/writeValueDialog.ts";
import { createLogger } from "../logger.ts";
import { DialogPanel } from "./components/DialogPanel.tsx";
import { ImportExportPanel } from "./components/ImportExportPanel.tsx";
import { LogPanel } from "./components/LogPanel.tsx";
import { OpcUaPanel } from "./components/OpcUaPanel.tsx";
import { ProjectTreePanel } from "./components/ProjectTreePanel.tsx";
import { TagTablePanel } from "./components/TagTablePanel.tsx";
import { WriteValuePanel } from "./components/WriteValuePanel.tsx";
import { downloadText } from "./download.ts";
import {
  type ActiveDialog,
  addDialog,
  type DialogEnv,
  editDialog,
  opcUaDialog,
  networkFromEnv,
} from "./editor.ts";
import { useLogs } from "./hooks/useLogs.ts";

export interface AppProps {
  initialProject?: Project;
  env?: DialogEnv;
  download?: (filename: string, text: string, type: string) => void;
  now?: () => Date; // DI for testing
}

interface DeviceContext {
  channel: ChannelNode;
  device: DeviceNode;
  /** Qualified prefix and tags of the selected device or group. */
  source: string;
  tags: TagEntry[];
}

const ADDABLE: Readonly<Record<NodeKind, readonly NodeKind[]>> = {
  Channel: ["Device"],
  Device: ["Group", "Tag"],
  Group: ["Group", "Tag"],
  Tag: [],
};

function deviceContext(found: FoundNode | undefined): DeviceContext | undefined {
  if (!found) return undefined;
  const { ancestors, node } = found;
  const [channel, second] = ancestors;
  if (channel?.kind !== "Channel") return undefined;
  if (node.kind === "Device") {
    return {
      channel,
      device: node,
      source: `${channel.name}.${node.name}`,
      tags: [...walkTags(node)],
    };
  }
  if (node.kind !== "Group" || second?.kind !== "Device") return undefined;
  const path = [...ancestors.slice(2).map((a) => a.name), node.name];
  return {
    channel,
    device: second,
    source: [channel.name, second.name, ...path].join("."),
    tags: [...walkTags(node, path)],
  };
}

export function App({
  initialProject,
  env = {},
  download = downloadText,
  now,
}: AppProps = {}) {
  const { logs, clearLogs, sink } = useLogs({ now });
  const logger = useMemo(
    () => createLogger("configurator", { console: false, sinks: [sink] }),
    [sink],
  );
  const [project, setProject] = useState<Project>(() => initialProject ?? createProject());
  const [selectedId, setSelectedId] = useState<string | null>(null);
  const [active, setActive] = useState<ActiveDialog | null>(null);
  const [dialogKey, setDialogKey] = useState(0);
  const [writeDialog, setWriteDialog] = useState<WriteValueDialog | null>(null);

  const selected = selectedId === null ? undefined : findNode(project, selectedId);
  const context = deviceContext(selected);
  const addable = selected ? ADDABLE[selected.node.kind] : (["Channel"] as const);

  const show = (dialog: ActiveDialog) => {
    setWriteDialog(null);
    setActive(dialog);
    setDialogKey((k) => k + 1);
  };

  const open = (res: ReturnType<typeof editDialog>) => {
    if (isErr(res)) {
      logger.error(res.err.message);
      return;
    }
    show(res.val);
  };

  const handleOk = (): string | undefined => {
    if (!active) return undefined;
    const res = active.accept(project);
    if (isErr(res)) return res.err.message;
    setProject(res.val);
    setActive(null);
    logger.info(`${active.title} saved`);
    return undefined;
  };

  const handleDelete = () => {
    if (!selected) return;
    const res = removeNode(project, selected.node.id);
    if (isErr(res)) {
      logger.error(res.err.message);
      return;
    }
    setProject(res.val);
    setSelectedId(null);
    logger.info(`Deleted ${selected.node.kind} ${selected.node.name}`);
  };

  const handleWrite = (entry: TagEntry) => {
    if (!context) return;
    const tag = mapTagToRuntime(entry.tag, entry.path, context.device, context.channel);
    setActive(null);
    setWriteDialog(
      new WriteValueDialog(
        {
          address: tag.address,
          data_type: entry.tag.dataType,
          function_code: tag.writeFunction,
          name: tag.qualifiedName,
          read_write: entry.tag.access,
        },
        (req) => {
          logger.info(
            `Write ${tag.qualifiedName}: fc=${req.functionCode} addr=${req.address} value=${String(req.value)}`,
          );
        },
      ),
    );
  };

  const handleImportJson = (text: string) => {
    const res = importProjectJson(text, networkFromEnv(env));
    if (isErr(res)) {
      logger.error(`Import failed: ${res.err.message}`);
      return;
    }
    setProject(res.val);
    setSelectedId(null);
    logger.info(`Imported ${res.val.channels.length} channel(s)`);
  };

  const handleImportCsv = (text: string) => {
    if (!context) return;
    const { channel, device } = context;
    const res = importTagsCsv(device, text);
    if (isErr(res)) {
      logger.error(`CSV import failed: ${res.err.message}`);
      return;
    }
    setProject({
      ...project,
      channels: project.channels.map((c) =>
        c.id !== channel.id
          ? c
          : { ...c, devices: c.devices.map((d) => (d.id === device.id ? res.val : d)) }
      ),
    });
    logger.info(`Imported tags into ${device.name}`);
  };

  return (
    <div className="container">
      <header className="header">
        <h1>ModLink Configurator</h1>
      </header>
      <main className="main-content">
        <ProjectTreePanel
          addable={addable}
          onAdd={(kind) => open(addDialog(project, selectedId, kind, env))}
          onDelete={handleDelete}
          onEdit={() => selectedId !== null && open(editDialog(project, selectedId, env))}
          onSelect={setSelectedId}
          project={project}
          selectedId={selectedId}
        />
        {active && (
          <DialogPanel
            key={dialogKey}
            onCancel={() => setActive(null)}
            onOk={handleOk}
            sections={active.sections}
            title={active.title}
          />
        )}
        {context && (
          <TagTablePanel onWrite={handleWrite} source={context.source} tags={context.tags} />
        )}
        {writeDialog && (
          <WriteValuePanel dialog={writeDialog} onClose={() => setWriteDialog(null)} />
        )}
        <OpcUaPanel
          onEdit={() => show(opcUaDialog(project, env))}
          settings={project.opcua}
        />
        <ImportExportPanel
          csvEnabled={context !== undefined}
          onError={(m) => logger.error(m)}
          onExportCsv={() => {
            if (!context) return;
            download(`${context.device.name}.csv`, exportTagsCsv(context.device), "text/csv");
          }}
          onExportJson={() => download("project.json", exportProjectJson(project), "application/json")}
          onImportCsv={handleImportCsv}
          onImportJson={handleImportJson}
        />
        <LogPanel logs={logs} onClear={clearLogs} />
      </main>
    </div>
  );
}
