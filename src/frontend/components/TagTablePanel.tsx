import type { FunctionalComponent } from "preact";
import type { TagEntry } from "../../config/project.ts";

interface Props {
  /** Where the tags come from, e.g. `Channel1.Device1`. */
  source: string;
  tags: readonly TagEntry[];
  onWrite: (entry: TagEntry) => void;
}

export const TagTablePanel: FunctionalComponent<Props> = ({ source, tags, onWrite }) => (
  <section className="panel tag-panel">
    <h2>Tags: {source}</h2>
    <table className="data-table">
      <thead>
        <tr>
          <th>Name</th>
          <th>Address</th>
          <th>Data Type</th>
          <th>Access</th>
          <th>Scan Rate</th>
          <th>Scaling</th>
          <th />
        </tr>
      </thead>
      <tbody>
        {tags.map((entry) => {
          const { tag, path } = entry;
          const name = [...path, tag.name].join(".");
          return (
            <tr key={tag.id}>
              <td>{name}</td>
              <td>{tag.address}</td>
              <td>{tag.dataType}</td>
              <td>{tag.access}</td>
              <td>{tag.scanRate}</td>
              <td>{tag.scaling.type}</td>
              <td>
                <button
                  aria-label={`Write ${name}`}
                  className="btn btn-secondary"
                  disabled={tag.access === "Read Only"}
                  onClick={() => onWrite(entry)}
                  type="button"
                >
                  Write
                </button>
              </td>
            </tr>
          );
        })}
      </tbody>
    </table>
  </section>
);
