"use client";
import { useEffect, useState } from "react";
import TripForm from "@/components/TripForm";
import LoadingOverlay from "@/components/LoadingOverlay";
import SectionCard from "@/components/SectionCard";
import ItineraryText from "@/components/ItineraryText";
import GuidePanel from "@/components/GuidePanel";
import SharePanel from "@/components/SharePanel";
import { checkHealth, requestGuide, requestPlan } from "@/lib/api";
import type { Guide } from "@/lib/guide";
import { tripDateRange } from "@/lib/share";
import { tripDays, tripLengthDays, type TripRequest } from "@/lib/trip";
import type { HealthResponse, PlanResponse } from "@/lib/types";

const errorText = (e: unknown) => (e instanceof Error ? e.message : "Failed to generate itinerary");

export default function Main() {
  const [health, setHealth] = useState<HealthResponse | null>(null);
  const [planning, setPlanning] = useState(false);
  const [plan, setPlan] = useState<PlanResponse | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [guide, setGuide] = useState<Guide | null>(null);
  const [guideLoading, setGuideLoading] = useState(false);
  const [guideError, setGuideError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    checkHealth()
      .then((h) => {
        if (!cancelled) setHealth(h);
      })
      .catch(() => {
        if (!cancelled) setHealth({ ok: false, model: null });
      });
    return () => {
      cancelled = true;
    };
  }, []);

  async function onPlan(trip: TripRequest) {
    setPlanning(true);
    setError(null);
    setPlan(null);
    setGuide(null);
    setGuideError(null);
    try {
      setPlan(await requestPlan(trip));
    } catch (e) {
      setError(errorText(e));
    } finally {
      setPlanning(false);
    }
  }

  async function onGuide(trip: TripRequest) {
    setGuideLoading(true);
    setGuideError(null);
    try {
      setGuide(await requestGuide(trip));
    } catch (e) {
      setGuideError(errorText(e));
    } finally {
      setGuideLoading(false);
    }
  }

  return (
    <div className="min-h-screen w-full bg-gradient-to-br from-sky-50 to-emerald-50">
      {planning && <LoadingOverlay />}

      <div className="mx-auto max-w-5xl px-4 py-8 md:py-10 space-y-6">
        <header className="flex flex-wrap items-end justify-between gap-3">
          <div>
            <h1 className="text-3xl font-semibold tracking-tight">Itinerary Concierge</h1>
            <p className="text-sm text-neutral-600">Day-by-day trip plans, written by a language model.</p>
          </div>
          <StatusBadge health={health} />
        </header>

        <section className="rounded-2xl border bg-white/90 backdrop-blur p-4 md:p-6 shadow-md">
          <TripForm busy={planning} onSubmit={(trip) => void onPlan(trip)} />
          {error && (
            <p role="alert" className="mt-3 text-sm text-red-600">
              {error}
            </p>
          )}
        </section>

        {plan && (
          <>
            <SectionCard tight>
              <div className="text-center text-lg font-semibold text-sky-800">
                {plan.trip.origin ? `${plan.trip.origin} → ` : ""}
                {plan.trip.destination}
              </div>
              <div className="text-center text-sm text-neutral-600">
                {tripDateRange(plan.trip)} · {tripLengthDays(plan.trip)} days · {plan.trip.travelers} traveler
                {plan.trip.travelers === 1 ? "" : "s"}
              </div>
            </SectionCard>

            <SectionCard title="Itinerary">
              <ItineraryText text={plan.itinerary} days={tripDays(plan.trip)} />
            </SectionCard>

            <SectionCard
              title="Destination guide"
              actions={
                !guide && (
                  <button
                    type="button"
                    disabled={guideLoading}
                    onClick={() => void onGuide(plan.trip)}
                    className="rounded-md border px-3 py-1.5 text-sm"
                  >
                    {guideLoading ? "Loading…" : "Load guide, budget & packing list"}
                  </button>
                )
              }
            >
              {guideError && (
                <p role="alert" className="text-sm text-red-600">
                  {guideError}
                </p>
              )}
              {guide ? (
                <GuidePanel guide={guide} currency={plan.trip.currency} />
              ) : (
                !guideError && (
                  <p className="text-sm text-neutral-500">
                    Attractions, food, budget estimates and a packing list for {plan.trip.destination}.
                  </p>
                )
              )}
            </SectionCard>

            <SectionCard title="Share">
              <SharePanel trip={plan.trip} itinerary={plan.itinerary} model={plan.model} />
            </SectionCard>
          </>
        )}

        <footer className="pb-8 text-xs text-neutral-500">
          Hours, prices and availability change; verify locally before you go.
        </footer>
      </div>
    </div>
  );
}

function StatusBadge({ health }: { health: HealthResponse | null }) {
  if (!health) {
    return <span className="rounded-full bg-neutral-200 px-2 py-1 text-xs text-neutral-700">Checking service…</span>;
  }
  return health.ok ? (
    <span className="rounded-full bg-emerald-500 px-2 py-1 text-xs text-white">Connected · {health.model}</span>
  ) : (
    <span className="rounded-full bg-rose-600 px-2 py-1 text-xs text-white">Not configured</span>
  );
}
