"use client";

import { useEffect } from "react";
import { reportClientError } from "@/lib/api";

export default function PageError({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    // eslint-disable-next-line no-console
    console.error("[page error]", { message: error.message, digest: error.digest });
    reportClientError("page", error);
  }, [error]);

  return (
    <div className="mx-auto max-w-xl p-6">
      <div className="rounded-xl border bg-white/90 p-4">
        <h2 className="text-lg font-semibold">Something went wrong showing your trip.</h2>
        <p className="mt-1 text-sm text-neutral-600">The details were logged. You can try again:</p>
        <button
          onClick={() => reset()}
          className="mt-3 rounded-lg bg-sky-600 px-3 py-1.5 text-white hover:bg-sky-700"
        >
          Retry
        </button>
      </div>
    </div>
  );
}
