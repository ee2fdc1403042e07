import type { Result } from "option-t/plain_result";
import {
  OPCUA_AUTH_TYPES,
  OPCUA_DEFAULTS,
  OPCUA_FALLBACK_URI_PORT,
  OPCUA_POLICY_LABELS,
  OPCUA_SECURITY_POLICIES,
  type SecurityPolicyKey,
} from "../config/constants.ts";
import type { NetworkAdapter } from "../config/network.ts";
import {
  defaultOpcUaSettings,
  defaultSecurityPolicies,
  type OpcUaSettings,
} from "../config/project.ts";
import {
  asString,
  type Dict,
  isRecord,
  validateAndGetInt,
} from "../config/utils.ts";
import { isValidPort, parseAdapterString } from "../config/validators.ts";
import type { ValidationError } from "../errors.ts";
import {
  type DialogModel,
  invalid,
  section,
  subscribeSections,
  valid,
} from "./dialog.ts";

export interface OpcUaGeneral {
  application_name: string;
  namespace: string;
  port: string;
  product_uri: string;
  network_adapter: string;
  network_adapter_ip: string;
  max_sessions: string;
  publish_interval: string;
}

export interface OpcUaAuthentication {
  authentication: string;
  username: string;
  password: string;
}

export type OpcUaPolicies = Record<SecurityPolicyKey, boolean>;

export interface OpcUaCertificate {
  auto_generate: boolean;
  common_name: string;
  organization: string;
  organization_unit: string;
  locality: string;
  state: string;
  country: string;
  cert_validity: string;
}

export interface OpcUaSections {
  general: OpcUaGeneral;
  authentication: OpcUaAuthentication;
  security_policies: OpcUaPolicies;
  certificate: OpcUaCertificate;
}

/**
 * Every section flattened at the top level plus the nested sections. The
 * nested `authentication` object shadows the flat auth type.
 */
export type OpcUaDialogData =
  & Omit<
    OpcUaGeneral & OpcUaAuthentication & OpcUaPolicies & OpcUaCertificate,
    "authentication"
  >
  & OpcUaSections;

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "modua"]);

const CERT_EDITABLE = [
  "organization",
  "organization_unit",
  "locality",
  "state",
  "country",
  "cert_validity",
] as const;

export class OpcUaDialog implements DialogModel<OpcUaDialogData> {
  readonly title = "OPC UA Server";
  readonly general = section("general", "Settings");
  readonly authentication = section("authentication", "Authentication");
  readonly policies = section("security_policies", "Security Policies");
  readonly certificate = section("certificate", "Certificate");
  readonly sections = [
    this.general,
    this.authentication,
    this.policies,
    this.certificate,
  ];

  #adapters: readonly NetworkAdapter[];
  /** Adapter combo label → IP. */
  #adapterIps: Map<string, string>;
  #detectOutboundIp: () => string;

  constructor(
    adapters: readonly NetworkAdapter[],
    detectOutboundIp: () => string,
  ) {
    this.#detectOutboundIp = detectOutboundIp;
    this.#adapters = adapters;
    this.#adapterIps = new Map(adapters.map((a) => [a.display, a.ip]));
    const d = OPCUA_DEFAULTS;

    this.general.form
      .addField("application_name", "Application Name", "text", [], d.application_name)
      .addField("namespace", "Namespace", "text", [], d.namespace)
      .addField("port", "Port", "text", [], d.port)
      .addField("network_adapter", "Network Adapter", "combo", [
        ...this.#adapterIps.keys(),
      ])
      .addField("network_adapter_ip", "Network Adapter IP")
      .addField("max_sessions", "Max Sessions", "text", [], d.max_sessions)
      .addField("publish_interval", "Publish Interval (ms)", "text", [], d.publish_interval)
      .addField("product_uri", "Product URI (Application URI)");
    this.general.form.setVisible("network_adapter_ip", false);
    this.general.form.setReadOnly("product_uri", true);

    this.authentication.form
      .addField("authentication", "Authentication", "combo", OPCUA_AUTH_TYPES, "Anonymous")
      .addField("username", "Username")
      .addField("password", "Password", "password");

    const policies = defaultSecurityPolicies();
    for (const key of OPCUA_SECURITY_POLICIES) {
      this.policies.form.addField(
        key,
        OPCUA_POLICY_LABELS[key],
        "checkbox",
        [],
        policies[key],
      );
    }

    this.certificate.form
      .addField("auto_generate", "Auto Generate Certificate", "checkbox", [], d.auto_generate)
      .addField("common_name", "Common Name", "text", [], d.common_name)
      .addField("organization", "Organization", "text", [], d.organization)
      .addField("organization_unit", "Organization Unit", "text", [], d.organization_unit)
      .addField("locality", "Locality", "text", [], d.locality)
      .addField("state", "State", "text", [], d.state)
      .addField("country", "Country", "text", [], d.country)
      .addField("cert_validity", "Certificate Validity", "text", [], d.cert_validity);
    this.certificate.form.setReadOnly("common_name", true);

    this.#syncAdapterIp();
    this.#syncDerived();
    subscribeSections(this.sections, () => this.#syncDerived());
  }

  /** Hidden IP follows the adapter combo. */
  #syncAdapterIp() {
    const label = this.general.form.getValue("network_adapter");
    const ip = this.#adapterIps.get(label) ?? parseAdapterString(label)[1];
    if (ip) this.general.form.setValue("network_adapter_ip", ip);
  }

  #lastAdapter = "";

  #syncDerived() {
    const adapter = this.general.form.getValue("network_adapter");
    if (adapter !== this.#lastAdapter) {
      this.#lastAdapter = adapter;
      this.#syncAdapterIp();
    }
    this.general.form.setValue("product_uri", this.productUri());

    const userPass =
      this.authentication.form.getValue("authentication") === "Username/Password";
    this.authentication.form.setVisible("username", userPass);
    this.authentication.form.setVisible("password", userPass);

    const auto = this.certificate.form.getBoolean("auto_generate");
    for (const id of CERT_EDITABLE) this.certificate.form.setEnabled(id, !auto);
  }

  /** `opc.tcp://host:port/`; loopback-like hosts use the outbound IP. */
  productUri(): string {
    const host = this.general.form.getValue("network_adapter_ip").trim();
    const port = this.general.form.getValue("port").trim() ||
      OPCUA_FALLBACK_URI_PORT;
    const h = !host || LOCAL_HOSTS.has(host.toLowerCase())
      ? (this.#detectOutboundIp() || "localhost")
      : host;
    return `opc.tcp://${h}:${port}/`;
  }

  #selectAdapterByIp(ip: string, name: string) {
    for (const [label, addr] of this.#adapterIps) {
      if (addr === ip) {
        this.general.form.setValue("network_adapter", label);
        return;
      }
    }
    const label = name ? `${name} (${ip})` : `Auto - ${ip}`;
    this.#adapterIps.set(label, ip);
    this.general.form.setOptions("network_adapter", [...this.#adapterIps.keys()]);
    this.general.form.setValue("network_adapter", label);
  }

  loadData(data: unknown): void {
    if (!isRecord(data)) return;
    const flat: Dict = {};
    for (const [k, v] of Object.entries(data)) {
      if (!isRecord(v)) flat[k] = v;
    }
    for (const key of ["general", "authentication", "security_policies", "certificate"]) {
      const sub = data[key];
      if (!isRecord(sub)) continue;
      for (const [k, v] of Object.entries(sub)) {
        if (!(k in flat)) flat[k] = v;
      }
    }
    if (flat.application_name === undefined && flat.application_Name !== undefined) {
      flat.application_name = flat.application_Name;
    }

    const { network_adapter: adapter, ...values } = flat;
    for (const s of this.sections) s.form.setValues(values);

    const [name] = parseAdapterString(asString(adapter));
    const ip = asString(flat.network_adapter_ip)?.trim();
    if (ip) {
      this.#selectAdapterByIp(ip, name);
      this.general.form.setValue("network_adapter_ip", ip);
      return;
    }
    // No address stored: match a listed adapter by name.
    const match = this.#adapters.find((a) => a.name === name);
    if (match) {
      this.general.form.setValue("network_adapter", match.display);
      this.general.form.setValue("network_adapter_ip", match.ip);
    }
  }

  getData(): OpcUaDialogData {
    const g = this.general.form;
    const a = this.authentication.form;
    const c = this.certificate.form;
    const general: OpcUaGeneral = {
      application_name: g.getValue("application_name"),
      max_sessions: g.getValue("max_sessions"),
      namespace: g.getValue("namespace"),
      network_adapter: g.getValue("network_adapter"),
      network_adapter_ip: g.getValue("network_adapter_ip"),
      port: g.getValue("port"),
      product_uri: this.productUri(),
      publish_interval: g.getValue("publish_interval"),
    };
    const authentication: OpcUaAuthentication = {
      authentication: a.getValue("authentication"),
      password: a.getValue("password"),
      username: a.getValue("username"),
    };
    const policies = defaultSecurityPolicies();
    for (const key of OPCUA_SECURITY_POLICIES) {
      policies[key] = this.policies.form.getBoolean(key);
    }
    const certificate: OpcUaCertificate = {
      auto_generate: c.getBoolean("auto_generate"),
      cert_validity: c.getValue("cert_validity"),
      common_name: c.getValue("common_name"),
      country: c.getValue("country"),
      locality: c.getValue("locality"),
      organization: c.getValue("organization"),
      organization_unit: c.getValue("organization_unit"),
      state: c.getValue("state"),
    };
    return {
      ...general,
      password: authentication.password,
      username: authentication.username,
      ...policies,
      ...certificate,
      authentication,
      certificate,
      general,
      security_policies: policies,
    };
  }

  validate(): Result<void, ValidationError> {
    if (!isValidPort(this.general.form.getValue("port").trim())) {
      return invalid("port", "Port must be between 1 and 65535");
    }
    const a = this.authentication.form;
    if (
      a.getValue("authentication") === "Username/Password" &&
      !a.getValue("username").trim()
    ) {
      return invalid("username", "Username is required");
    }
    return valid();
  }

  toSettings(): OpcUaSettings {
    const d = defaultOpcUaSettings();
    const { authentication: auth, certificate: cert, general, security_policies } =
      this.getData();
    const [adapterName, adapterIp] = parseAdapterString(general.network_adapter);
    return {
      applicationName: general.application_name,
      authentication: {
        password: auth.password,
        type: OPCUA_AUTH_TYPES.find((t) => t === auth.authentication) ??
          "Anonymous",
        username: auth.username,
      },
      certificate: {
        autoGenerate: cert.auto_generate,
        commonName: cert.common_name,
        country: cert.country,
        locality: cert.locality,
        organization: cert.organization,
        organizationUnit: cert.organization_unit,
        state: cert.state,
        validityYears: validateAndGetInt(
          cert.cert_validity,
          d.certificate.validityYears,
          1,
          20,
        ),
      },
      maxSessions: validateAndGetInt(general.max_sessions, d.maxSessions, 1),
      namespace: general.namespace,
      networkAdapter: adapterName,
      networkAdapterIp: general.network_adapter_ip || (adapterIp ?? ""),
      port: validateAndGetInt(general.port, d.port, 1, 65535),
      productUri: general.product_uri,
      publishInterval: validateAndGetInt(
        general.publish_interval,
        d.publishInterval,
        1,
      ),
      securityPolicies: security_policies,
    };
  }
}
