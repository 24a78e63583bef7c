// app/layout.tsx
import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: {
    default: "Itinerary Concierge",
    template: "%s · Itinerary Concierge",
  },
  description: "Turn a destination, dates and a few preferences into a day-by-day travel itinerary.",
  applicationName: "Itinerary Concierge",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" className="h-full w-full overflow-x-clip bg-white">
      <body className="antialiased min-h-screen w-full overflow-x-clip text-stone-900 bg-gray-100">
        <main className="w-full min-h-screen">{children}</main>
      </body>
    </html>
  );
}
