/**
 * TUI components barrel export.
 */

export { Header, type HeaderProps, type KeyHint } from "./Header.js";
export {
  Notice,
  noticeFromError,
  type NoticeKind,
  type NoticeState,
} from "./Notice.js";
export { StatusBadge, type StatusBadgeProps } from "./StatusBadge.js";
export { Table, type TableProps, type Column } from "./Table.js";
