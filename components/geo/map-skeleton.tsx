export function MapSkeleton({ className }: { className?: string }) {
  return (
    <div
      aria-busy="true"
      className={`animate-pulse rounded-lg bg-secondary ${className ?? "h-full w-full"}`}
    />
  );
}
