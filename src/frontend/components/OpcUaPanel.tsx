import type { FunctionalComponent } from "preact";
import type { OpcUaSettings } from "../../config/project.ts";

interface Props {
  settings: OpcUaSettings;
  onEdit: () => void;
}

export const OpcUaPanel: FunctionalComponent<Props> = ({ settings, onEdit }) => {
  const policies = Object.entries(settings.securityPolicies)
    .filter(([, on]) => on)
    .map(([name]) => name);
  return (
    <section className="panel opcua-panel">
      <h2>OPC UA Server</h2>
      <dl>
        <dt>Application</dt>
        <dd>{settings.applicationName}</dd>
        <dt>Endpoint</dt>
        <dd>
          opc.tcp://{settings.networkAdapterIp || "0.0.0.0"}:{settings.port}
        </dd>
        <dt>Authentication</dt>
        <dd>{settings.authentication.type}</dd>
        <dt>Security</dt>
        <dd>{policies.length > 0 ? policies.join(", ") : "None"}</dd>
      </dl>
      <button className="btn btn-secondary" onClick={onEdit} type="button">
        Edit Settings
      </button>
    </section>
  );
};
