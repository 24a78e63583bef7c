// components/LoadingOverlay.tsx
"use client";
import React from "react";

export default function LoadingOverlay({ label = "Planning your trip…" }: { label?: string }) {
  return (
    <div
      role="status"
      aria-live="polite"
      className="fixed inset-0 z-[60] grid place-items-center bg-white/70 backdrop-blur"
    >
      <div className="flex flex-col items-center gap-3">
        <div className="relative h-32 w-32">
          <div className="absolute inset-0 animate-bounce">
            <svg viewBox="0 0 200 200" className="h-full w-full" aria-hidden="true">
              <rect x="55" y="70" width="90" height="70" rx="12" fill="#0EA5E9" />
              <rect x="80" y="55" width="40" height="18" rx="6" fill="none" stroke="#0369A1" strokeWidth="6" />
              <line x1="80" y1="70" x2="80" y2="140" stroke="#E0F2FE" strokeWidth="6" />
              <line x1="120" y1="70" x2="120" y2="140" stroke="#E0F2FE" strokeWidth="6" />
              <circle cx="72" cy="146" r="6" fill="#0C4A6E" />
              <circle cx="128" cy="146" r="6" fill="#0C4A6E" />
            </svg>
          </div>
          <div className="absolute inset-x-0 -bottom-1 h-2 rounded-full bg-sky-200 animate-pulse" />
        </div>
        <div className="text-sm text-sky-900">{label}</div>
      </div>
    </div>
  );
}
