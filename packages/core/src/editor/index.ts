export {
  validateAndBuild,
  applyEdit,
  toEditableFields,
  DISPLAY_FORMAT,
  type EditableFields,
} from "./record-editor.js";
