import type { ReactNode } from 'react';
export const metadata = { title: 'News Agent', description: 'Summarized news reports'};
export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body style={{margin:0,fontFamily:'system-ui'}}>{children}</body>
    </html>
  );
}
