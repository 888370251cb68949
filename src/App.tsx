// src/App.tsx
import { Routes, Route, Navigate } from 'react-router-dom';
import Dashboard from './pages/Dashboard';
import HistoricalTrends from './pages/HistoricalTrends';

export default function App() {
  return (
    <Routes>
      <Route path="/" element={<Dashboard />} />
      <Route path="/trends" element={<HistoricalTrends />} />
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  );
}
