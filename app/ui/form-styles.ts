export const formStyles = {
  card: "flex flex-col overflow-hidden rounded-2xl border border-border bg-background shadow-sm",
  body: "flex flex-col gap-4 px-6 py-5",
  footer:
    "flex items-center justify-end gap-2.5 border-t border-border bg-surface/50 px-6 py-2.5",
  label: "flex flex-col gap-1 text-sm font-medium text-foreground",
  hint: "text-xs font-normal text-muted",
  input:
    "rounded-lg border border-border bg-background px-3 py-1.5 text-sm font-normal text-foreground shadow-sm focus:border-border-hover focus:outline-none",
  primaryBtn:
    "rounded-lg bg-foreground px-3.5 py-1.5 text-sm font-medium text-background shadow-sm transition-colors hover:bg-foreground/85 active:bg-foreground/70 disabled:opacity-50",
  error:
    "mt-6 rounded-lg border border-red-300 bg-red-50 px-4 py-3 text-sm text-red-800",
  notice: "text-xs text-muted",
  notes:
    "mt-6 whitespace-pre-wrap rounded-lg border border-border bg-surface px-5 py-4 font-mono text-sm leading-relaxed",
};
