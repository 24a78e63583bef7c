// components/SectionCard.tsx
import type { ReactNode } from "react";

export default function SectionCard({
  title,
  actions,
  children,
  tight = false,
}: {
  title?: string;
  actions?: ReactNode;
  children: ReactNode;
  tight?: boolean;
}) {
  return (
    <section className={`rounded-xl bg-white/95 border shadow-sm ${tight ? "px-4 py-3" : "p-4"}`}>
      {(title || actions) && (
        <div className="mb-3 flex items-center justify-between gap-2">
          {title && <h2 className="text-lg font-semibold">{title}</h2>}
          {actions}
        </div>
      )}
      {children}
    </section>
  );
}
