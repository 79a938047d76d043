import React from "react"
import type { Metadata } from 'next'
import { Toaster } from 'sonner'
import { ErrorBoundary } from '@/components/error-boundary'
import { SiteHeader } from '@/components/site-header'
import { getCurrentUser } from '@/lib/auth/current-user'
import './globals.css'

export const metadata: Metadata = {
  title: 'Geo Profiles',
  description: 'User profiles with locations on an interactive map.',
}

export default async function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  const user = await getCurrentUser()
  const headerUser = user
    ? { username: user.username, is_staff: user.is_staff, is_superuser: user.is_superuser }
    : null

  return (
    <html lang="en">
      <body className="font-sans antialiased">
        <SiteHeader user={headerUser} />
        <ErrorBoundary name="AppErrorBoundary">
          {children}
        </ErrorBoundary>
        <Toaster richColors position="top-right" />
      </body>
    </html>
  )
}
