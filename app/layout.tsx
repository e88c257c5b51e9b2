import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "Relatedness Search",
  description: "Turn a research question into ranked arXiv and web results",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
