import type { Result } from "option-t/plain_result";
import { createGroup, type GroupNode } from "../config/project.ts";
import { asString, type Dict, isRecord } from "../config/utils.ts";
import type { ValidationError } from "../errors.ts";
import { type DialogModel, invalid, section, valid } from "./dialog.ts";

export interface GroupDialogData {
  name: string;
  description: string;
  general: { name: string; description: string };
}

export class GroupDialog implements DialogModel<GroupDialogData> {
  readonly title = "Group Properties";
  readonly general = section("general", "General");
  readonly sections = [this.general];

  constructor(suggestedName = "Group1") {
    this.general.form
      .addField("name", "Name:", "text", [], suggestedName)
      .addField("description", "Description:");
  }

  loadData(data: unknown): void {
    if (!isRecord(data)) return;
    const src: Dict = isRecord(data.general) ? data.general : data;
    this.general.form.setValues({
      description: asString(src.description) ?? "",
      name: asString(src.name) ?? "",
    });
  }

  getData(): GroupDialogData {
    const name = this.general.form.getValue("name");
    const description = this.general.form.getValue("description");
    return { description, general: { description, name }, name };
  }

  validate(): Result<void, ValidationError> {
    return this.general.form.getValue("name").trim()
      ? valid()
      : invalid("name", "Group name is required");
  }

  toGroupNode(base?: GroupNode): GroupNode {
    const { description, name } = this.getData();
    const node = createGroup({
      children: base?.children ?? [],
      description,
      name,
    });
    return base ? { ...node, id: base.id } : node;
  }
}
