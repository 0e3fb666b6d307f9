/** Loading indicator shared by route guards and pages. */
export default function Spinner({ fullScreen = false }: { fullScreen?: boolean }) {
  return (
    <div
      className={`flex items-center justify-center ${fullScreen ? "min-h-screen" : "py-20"}`}
    >
      <div className="h-8 w-8 animate-spin rounded-full border-2 border-cadence-teal-300 border-t-transparent" />
    </div>
  );
}
