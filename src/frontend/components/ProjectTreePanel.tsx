import type { FunctionalComponent } from "preact";
import {
  childrenOf,
  type NodeKind,
  type Project,
  type ProjectNode,
} from "../../config/project.ts";

interface Props {
  project: Project;
  selectedId: string | null;
  onSelect: (id: string | null) => void;
  onAdd: (kind: NodeKind) => void;
  onEdit: () => void;
  onDelete: () => void;
  /** Kinds the selection can take as children; channels at the root. */
  addable: readonly NodeKind[];
}

function TreeNode({ node, selectedId, onSelect }: {
  node: ProjectNode;
  selectedId: string | null;
  onSelect: (id: string) => void;
}) {
  const children = childrenOf(node);
  return (
    <li>
      <button
        aria-pressed={node.id === selectedId}
        className={node.id === selectedId ? "tree-item selected" : "tree-item"}
        onClick={() => onSelect(node.id)}
        type="button"
      >
        {node.name}
      </button>
      {children.length > 0 && (
        <ul>
          {children.map((c) => (
            <TreeNode key={c.id} node={c} onSelect={onSelect} selectedId={selectedId} />
          ))}
        </ul>
      )}
    </li>
  );
}

export const ProjectTreePanel: FunctionalComponent<Props> = ({
  project,
  selectedId,
  onSelect,
  onAdd,
  onEdit,
  onDelete,
  addable,
}) => (
  <section className="panel tree-panel">
    <h2>Project</h2>
    <div className="form-row">
      {addable.map((kind) => (
        <button
          className="btn btn-secondary"
          key={kind}
          onClick={() => onAdd(kind)}
          type="button"
        >
          Add {kind}
        </button>
      ))}
      <button
        className="btn btn-secondary"
        disabled={selectedId === null}
        onClick={onEdit}
        type="button"
      >
        Edit
      </button>
      <button
        className="btn btn-secondary"
        disabled={selectedId === null}
        onClick={onDelete}
        type="button"
      >
        Delete
      </button>
      <button
        className="btn btn-secondary"
        disabled={selectedId === null}
        onClick={() => onSelect(null)}
        type="button"
      >
        Deselect
      </button>
    </div>
    {project.channels.length === 0
      ? <p className="empty">No channels</p>
      : (
        <ul className="tree">
          {project.channels.map((c) => (
            <TreeNode key={c.id} node={c} onSelect={onSelect} selectedId={selectedId} />
          ))}
        </ul>
      )}
  </section>
);
